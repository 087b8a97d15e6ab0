import { describe, it, expect, vi } from "vitest";
import { parseJsonReply, withReferenceData } from "../src/llm/text-generator.js";
import {
  OpenAiTextGenerator,
  type ChatCompletionParams,
} from "../src/llm/openai-generator.js";
import { loadLlmConfig, type LlmConfig } from "../src/core/config.js";

function makeConfig(overrides: Partial<LlmConfig> = {}): LlmConfig {
  return {
    ...loadLlmConfig(),
    apiKey: "test-key",
    model: "test-model",
    maxTokens: 500,
    temperature: 0.2,
    historyWindow: 2,
    rateLimitMs: 0,
    ...overrides,
  };
}

describe("parseJsonReply", () => {
  it("parses a bare object", () => {
    expect(parseJsonReply(' {"a": 1} ')).toEqual({ a: 1 });
  });

  it("strips a markdown fence", () => {
    expect(parseJsonReply('```json\n{"intent": "rti"}\n```')).toEqual({ intent: "rti" });
    expect(parseJsonReply('```\n{"b": true}```')).toEqual({ b: true });
  });

  it("returns null for prose, arrays and scalars", () => {
    expect(parseJsonReply("not json")).toBeNull();
    expect(parseJsonReply("[1, 2]")).toBeNull();
    expect(parseJsonReply("42")).toBeNull();
    expect(parseJsonReply("null")).toBeNull();
  });
});

describe("withReferenceData", () => {
  it("appends a delimited data block", () => {
    expect(withReferenceData("Prompt", "x=1")).toBe(
      "Prompt\n\n--- REFERENCE DATA ---\nx=1\n--- END DATA ---",
    );
  });

  it("leaves the prompt alone when there is no data", () => {
    expect(withReferenceData("Prompt", "")).toBe("Prompt");
  });
});

describe("OpenAiTextGenerator", () => {
  it("builds system, trimmed history and user messages", async () => {
    const transport = vi.fn<(params: ChatCompletionParams) => Promise<string | null>>()
      .mockResolvedValue("reply");
    const generator = new OpenAiTextGenerator(makeConfig(), transport);

    const text = await generator.complete({
      systemPrompt: "sys",
      userMessage: "now",
      history: [
        { role: "user", content: "one" },
        { role: "assistant", content: "two" },
        { role: "user", content: "three" },
      ],
    });

    expect(text).toBe("reply");
    expect(transport).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 500,
      temperature: 0.2,
      messages: [
        { role: "system", content: "sys" },
        { role: "assistant", content: "two" },
        { role: "user", content: "three" },
        { role: "user", content: "now" },
      ],
    });
  });

  it("sends no history when the window is zero", async () => {
    const transport = vi.fn<(params: ChatCompletionParams) => Promise<string | null>>()
      .mockResolvedValue("ok");
    const generator = new OpenAiTextGenerator(makeConfig({ historyWindow: 0 }), transport);

    await generator.complete({
      systemPrompt: "sys",
      userMessage: "hi",
      history: [{ role: "user", content: "old" }],
    });

    expect(transport.mock.calls[0][0].messages).toHaveLength(2);
  });

  it("returns an empty string for an empty reply", async () => {
    const transport = vi.fn<(params: ChatCompletionParams) => Promise<string | null>>()
      .mockResolvedValue(null);
    const generator = new OpenAiTextGenerator(makeConfig(), transport);

    expect(await generator.complete({ systemPrompt: "s", userMessage: "u" })).toBe("");
  });

  it("propagates transport errors", async () => {
    const transport = vi.fn<(params: ChatCompletionParams) => Promise<string | null>>()
      .mockRejectedValue(new Error("503 upstream"));
    const generator = new OpenAiTextGenerator(makeConfig(), transport);

    await expect(
      generator.complete({ systemPrompt: "s", userMessage: "u" }),
    ).rejects.toThrow("503 upstream");
  });
});
