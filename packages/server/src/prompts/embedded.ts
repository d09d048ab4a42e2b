import type { Persona } from "../config.js";
import type { CollegeData } from "../data/collegeData.js";
import { encode } from "@toon-format/toon";

/** Canned model turn that follows the embedded prompt in the seeded history. */
export function buildGreeting(persona: Persona): string {
  return `Hello! I'm ${persona.assistantName}, your AI assistant for ${persona.institutionName}. How can I help you today?`;
}

/**
 * System prompt with the whole dataset inlined in compact notation, so the
 * model answers from it alone.
 */
export function buildEmbeddedPrompt(data: CollegeData, persona: Persona): string {
  return [
    `You are "${persona.assistantName}", a friendly, multilingual, and helpful AI assistant for ${persona.institutionName}.`,
    "",
    "Your primary goal is to answer user questions based *only* on the information provided below.",
    "- Do not make up information or use external knowledge.",
    "- If the answer is not found in the provided data, politely say that you don't have that information in the user's language.",
    "- Detect the user's language and respond in the same language.",
    "- Be robust to spelling and grammatical errors in the user's query. Try to understand the intent.",
    "- Format your answers clearly, using markdown for bolding and lists when appropriate.",
    "",
    "Here is the college data in TOON (Token-Oriented Object Notation) format:",
    "---",
    encode(data),
    "---",
  ].join("\n");
}
