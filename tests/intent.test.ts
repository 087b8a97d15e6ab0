import { describe, it, expect } from "vitest";
import { detectIntent, toIntentResult } from "../src/domain/conversation/intent.js";
import { intentReply, makeGenerator } from "./fixtures.js";

describe("toIntentResult", () => {
  it("keeps a known intent and normalizes the language code", () => {
    expect(
      toIntentResult({
        intent: "rti",
        profile_updates: { state: "Bihar" },
        language_detected: " HI ",
      }),
    ).toEqual({
      intent: "rti",
      profile_updates: { state: "Bihar" },
      language_detected: "hi",
    });
  });

  it("reads a missing intent as greeting and a foreign one as unknown", () => {
    expect(toIntentResult({}).intent).toBe("greeting");
    expect(toIntentResult({ intent: "weather" }).intent).toBe("unknown");
  });

  it("drops malformed updates and blank languages", () => {
    const result = toIntentResult({
      intent: "profile_update",
      profile_updates: ["age", 30],
      language_detected: "",
    });
    expect(result.profile_updates).toEqual({});
    expect(result.language_detected).toBeNull();
  });
});

describe("detectIntent", () => {
  it("sends the message with history to the generator", async () => {
    const { generator, complete } = makeGenerator([
      intentReply("scheme_discovery", { age: 60 }, "en"),
    ]);
    const history = [{ role: "assistant" as const, content: "How old are you?" }];

    const result = await detectIntent(generator, "I am 60", history);

    expect(result).toEqual({
      intent: "scheme_discovery",
      profile_updates: { age: 60 },
      language_detected: "en",
    });
    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0][0];
    expect(request.userMessage).toBe("I am 60");
    expect(request.history).toEqual(history);
    expect(request.systemPrompt).toContain('"profile_update"');
  });

  it("accepts a fenced JSON reply", async () => {
    const { generator } = makeGenerator(['```json\n{"intent": "financial"}\n```']);
    expect((await detectIntent(generator, "loan?")).intent).toBe("financial");
  });

  it("falls back to greeting when the reply is not JSON", async () => {
    const { generator } = makeGenerator(["Sure! The user wants schemes."]);
    expect(await detectIntent(generator, "hello")).toEqual({
      intent: "greeting",
      profile_updates: {},
      language_detected: null,
    });
  });
});
