import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockSendMessage, mockStartChat, mockGetGenerativeModel, apiKeys } = vi.hoisted(() => {
  const mockSendMessage = vi.fn();
  const mockStartChat = vi.fn(() => ({ sendMessage: mockSendMessage }));
  const mockGetGenerativeModel = vi.fn(() => ({ startChat: mockStartChat }));
  const apiKeys: string[] = [];
  return { mockSendMessage, mockStartChat, mockGetGenerativeModel, apiKeys };
});

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class MockGoogleGenerativeAI {
    constructor(apiKey: string) {
      apiKeys.push(apiKey);
    }
    getGenerativeModel = mockGetGenerativeModel;
  },
}));

import { GeminiClient, createLlmClient } from "./client.js";
import { loadConfig } from "../config.js";
import { isDeterministicError } from "../errors.js";
import type { ToolDef } from "../chat/tools.js";

function textResult(text: string) {
  return { response: { text: () => text, functionCalls: () => undefined } };
}

function callResult(...names: string[]) {
  return {
    response: {
      text: () => "",
      functionCalls: () => names.map((name) => ({ name, args: {} })),
    },
  };
}

describe("GeminiClient", () => {
  beforeEach(() => {
    mockSendMessage.mockReset();
    mockStartChat.mockClear();
    mockGetGenerativeModel.mockClear();
    apiKeys.length = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("trims the API key", () => {
    new GeminiClient("  test-secret\n", "gemini-2.0-flash-lite", 5);
    expect(apiKeys).toEqual(["test-secret"]);
  });

  it("seeds the chat history and returns the reply text", async () => {
    mockSendMessage.mockResolvedValue(textResult("Hostel fee is 50000."));
    const client = new GeminiClient("test-secret", "gemini-2.0-flash-lite", 5);

    const reply = await client.chat({
      history: [
        { role: "user", text: "prompt" },
        { role: "model", text: "greeting" },
      ],
      message: "What are the hostel fees?",
    });

    expect(reply).toBe("Hostel fee is 50000.");
    expect(mockGetGenerativeModel).toHaveBeenCalledWith({
      model: "gemini-2.0-flash-lite",
      systemInstruction: undefined,
      tools: undefined,
    });
    expect(mockStartChat).toHaveBeenCalledWith({
      history: [
        { role: "user", parts: [{ text: "prompt" }] },
        { role: "model", parts: [{ text: "greeting" }] },
      ],
    });
    expect(mockSendMessage).toHaveBeenCalledWith("What are the hostel fees?");
  });

  it("runs requested tools and sends their results back", async () => {
    const handler = vi.fn(async () => ({ hostel_fee: "50000" }));
    const tools: ToolDef[] = [{ name: "get_college_info", description: "College facts", handler }];
    mockSendMessage
      .mockResolvedValueOnce(callResult("get_college_info"))
      .mockResolvedValueOnce(textResult("The hostel fee is 50000."));
    const client = new GeminiClient("test-secret", "gemini-2.0-flash-lite", 5);

    const reply = await client.chat({ systemInstruction: "rules", tools, message: "hostel fees?" });

    expect(reply).toBe("The hostel fee is 50000.");
    expect(handler).toHaveBeenCalledWith({});
    expect(mockGetGenerativeModel).toHaveBeenCalledWith({
      model: "gemini-2.0-flash-lite",
      systemInstruction: "rules",
      tools: [{ functionDeclarations: [{ name: "get_college_info", description: "College facts", parameters: undefined }] }],
    });
    expect(mockSendMessage).toHaveBeenNthCalledWith(2, [
      { functionResponse: { name: "get_college_info", response: { hostel_fee: "50000" } } },
    ]);
  });

  it("wraps non-object tool results and answers unknown tools with an error", async () => {
    const tools: ToolDef[] = [{ name: "list_courses", description: "Courses", handler: async () => ["CSE", "ECE"] }];
    mockSendMessage
      .mockResolvedValueOnce(callResult("list_courses", "missing_tool"))
      .mockResolvedValueOnce(textResult("done"));
    const client = new GeminiClient("test-secret", "gemini-2.0-flash-lite", 5);

    await client.chat({ tools, message: "courses?" });

    expect(mockSendMessage).toHaveBeenNthCalledWith(2, [
      { functionResponse: { name: "list_courses", response: { result: ["CSE", "ECE"] } } },
      { functionResponse: { name: "missing_tool", response: { error: "Unknown tool: missing_tool" } } },
    ]);
  });

  it("stops after the configured number of tool rounds", async () => {
    const tools: ToolDef[] = [{ name: "get_college_info", description: "College facts", handler: async () => ({}) }];
    mockSendMessage.mockResolvedValue(callResult("get_college_info"));
    const client = new GeminiClient("test-secret", "gemini-2.0-flash-lite", 2);

    const error = await client.chat({ tools, message: "loop" }).catch((e: unknown) => e);

    expect(isDeterministicError(error) && error.code).toBe("TOOL_LOOP_LIMIT");
    expect(mockSendMessage).toHaveBeenCalledTimes(3);
  });
});

describe("createLlmClient", () => {
  it("returns null without an API key", () => {
    expect(createLlmClient(loadConfig({}))).toBeNull();
  });

  it("builds a Gemini client when the key is set", () => {
    expect(createLlmClient(loadConfig({ GOOGLE_API_KEY: "test-secret" }))).toBeInstanceOf(GeminiClient);
  });
});
