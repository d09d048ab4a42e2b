import type { FunctionDeclarationSchema } from "@google/generative-ai";
import type { CollegeData } from "../data/collegeData.js";
import type { JsonValue } from "../json.js";
import { COLLEGE_INFO_TOOL } from "../prompts/toolProtocol.js";

export type Tool = { name: string; description: string; inputSchema?: FunctionDeclarationSchema };
export type ToolHandler = (input: object) => Promise<JsonValue>;
export type ToolDef = Tool & { handler: ToolHandler };

/**
 * Tools the model may call during a chat. The provider decides whether and
 * how often; handlers only run when asked.
 */
export function buildTools(loadData: () => Promise<CollegeData>): ToolDef[] {
  return [
    {
      name: COLLEGE_INFO_TOOL,
      description:
        "Fetch the latest information about the college (fees, courses, admissions, hostel, faculty, " +
        "placements, contacts, events). Call this for any factual question about the college. " +
        "Returns a JSON document; an object with an \"error\" key means the data is unavailable.",
      handler: async () => loadData(),
    },
  ];
}
