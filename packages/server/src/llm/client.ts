import {
  GoogleGenerativeAI,
  type Content,
  type FunctionDeclaration,
  type FunctionResponsePart,
} from "@google/generative-ai";
import type { AppConfig } from "../config.js";
import { err } from "../errors.js";
import type { ToolDef } from "../chat/tools.js";
import type { JsonValue } from "../json.js";

export type ChatTurn = { role: "user" | "model"; text: string };

export type ChatRequest = {
  systemInstruction?: string;
  history?: ChatTurn[];
  tools?: ToolDef[];
  message: string;
};

export interface LlmClient {
  /** Sends one user message and resolves with the model's final text. */
  chat(req: ChatRequest): Promise<string>;
}

function toContent(turn: ChatTurn): Content {
  return { role: turn.role, parts: [{ text: turn.text }] };
}

function toDeclaration(tool: ToolDef): FunctionDeclaration {
  return { name: tool.name, description: tool.description, parameters: tool.inputSchema };
}

// functionResponse.response must be an object; wrap arrays and primitives.
function toResponseObject(value: JsonValue): object {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? value : { result: value };
}

export class GeminiClient implements LlmClient {
  private genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private modelName: string, private maxToolRounds: number) {
    this.genAI = new GoogleGenerativeAI(apiKey.trim());
  }

  async chat(req: ChatRequest): Promise<string> {
    const tools = req.tools ?? [];
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      systemInstruction: req.systemInstruction,
      tools: tools.length ? [{ functionDeclarations: tools.map(toDeclaration) }] : undefined,
    });

    const session = model.startChat({ history: (req.history ?? []).map(toContent) });
    let result = await session.sendMessage(req.message);

    for (let round = 0; ; round++) {
      const calls = result.response.functionCalls() ?? [];
      if (calls.length === 0) break;
      if (round >= this.maxToolRounds) {
        throw err("TOOL_LOOP_LIMIT", `Model kept calling tools after ${this.maxToolRounds} rounds`);
      }

      const parts: FunctionResponsePart[] = [];
      for (const call of calls) {
        const tool = tools.find((t) => t.name === call.name);
        console.log(`[llm] tool call ${call.name}${tool ? "" : " (unknown)"}`);
        const response: JsonValue = tool ? await tool.handler(call.args) : { error: `Unknown tool: ${call.name}` };
        parts.push({ functionResponse: { name: call.name, response: toResponseObject(response) } });
      }
      result = await session.sendMessage(parts);
    }

    return result.response.text();
  }
}

/** Null when no API key is configured; the chat handler then degrades. */
export function createLlmClient(cfg: AppConfig): LlmClient | null {
  if (!cfg.googleApiKey) return null;
  return new GeminiClient(cfg.googleApiKey, cfg.geminiModel, cfg.maxToolRounds);
}
