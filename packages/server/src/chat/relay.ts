import type { Persona, PromptMode } from "../config.js";
import { isFetchFailure, type CollegeData } from "../data/collegeData.js";
import { describeError } from "../errors.js";
import type { LlmClient } from "../llm/client.js";
import { buildEmbeddedPrompt, buildGreeting } from "../prompts/embedded.js";
import { buildToolProtocol } from "../prompts/toolProtocol.js";
import { buildTools } from "./tools.js";

export const REPLY_NOT_CONFIGURED = "Error: The chatbot is not configured correctly. Please check server logs.";
export const REPLY_EMPTY_MESSAGE = "Please provide a message.";
export const REPLY_FAILURE = "Sorry, something went wrong on my end. Please try again.";

export type ChatReply = { reply: string };

export type RelayDeps = {
  llm: LlmClient | null;
  mode: PromptMode;
  persona: Persona;
  loadData: () => Promise<CollegeData>;
};

/**
 * Handles one chat message. Every outcome is a reply string: missing
 * configuration, empty input and provider failures map to canned replies.
 */
export async function relayChat(message: string | null | undefined, deps: RelayDeps): Promise<ChatReply> {
  if (!deps.llm) return { reply: REPLY_NOT_CONFIGURED };

  if (!message) return { reply: REPLY_EMPTY_MESSAGE };

  try {
    if (deps.mode === "tool") {
      const reply = await deps.llm.chat({
        systemInstruction: buildToolProtocol(deps.persona),
        tools: buildTools(deps.loadData),
        message,
      });
      return { reply };
    }

    // Fetch on every request; the sheet is the live source.
    const data = await deps.loadData();
    if (isFetchFailure(data)) console.warn(`[chat] answering without live data: ${data.error}`);
    const reply = await deps.llm.chat({
      history: [
        { role: "user", text: buildEmbeddedPrompt(data, deps.persona) },
        { role: "model", text: buildGreeting(deps.persona) },
      ],
      message,
    });
    return { reply };
  } catch (e) {
    console.error(`[chat] error during chat generation: ${describeError(e)}`);
    return { reply: REPLY_FAILURE };
  }
}
