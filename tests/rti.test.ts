import { describe, it, expect } from "vitest";
import path from "path";
import {
  countWords,
  fallbackClassification,
  RtiAssistant,
  submissionInstructions,
} from "../src/domain/rti/rti-assistant.js";
import { RTI_CATEGORIES, RtiTemplateSet } from "../src/domain/rti/rti-templates.js";
import { CatalogError } from "../src/data-sources/json-source.js";
import { DATA_DIR, makeGenerator, makeProfile } from "./fixtures.js";

const LONG_COMPLAINT =
  "My mother applied for widow pension eight months ago in Gaya and nothing has arrived yet";

async function loadTemplates(): Promise<RtiTemplateSet> {
  return RtiTemplateSet.load(path.join(DATA_DIR, "rti-templates.json"));
}

describe("RtiTemplateSet", () => {
  it("loads a template for every category", async () => {
    const templates = await loadTemplates();
    for (const category of RTI_CATEGORIES) {
      expect(templates.get(category).questions.length).toBeGreaterThan(0);
    }
    expect(templates.get("pension_delay").department).toBe("Social Welfare Department");
  });

  it("requires every category", () => {
    expect(() =>
      RtiTemplateSet.fromRecords({
        general: { department: "D", pio: "P", fee: "₹10", questions: ["Q?"] },
      }),
    ).toThrow(CatalogError);
  });

  it("names the broken field", () => {
    const good = { department: "D", pio: "P", fee: "₹10", questions: ["Q?"] };
    const data: Record<string, unknown> = {};
    for (const category of RTI_CATEGORIES) data[category] = good;
    data.road_repair = { ...good, pio: "" };

    expect(() => RtiTemplateSet.fromRecords(data)).toThrow(
      'Invalid RTI templates:\n  - road_repair: "pio" must be a non-empty string',
    );
  });
});

describe("complaint helpers", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("  pension   not received ")).toBe(3);
    expect(countWords("")).toBe(0);
    expect(countWords(LONG_COMPLAINT)).toBe(16);
  });

  it("falls back to the general template with a truncated summary", () => {
    const text = "x".repeat(250);
    expect(fallbackClassification(text)).toEqual({
      category: "general",
      department: "Concerned department",
      issue_summary: "x".repeat(200),
      location: "",
      duration: "",
      previous_attempts: "",
    });
  });
});

describe("RtiAssistant", () => {
  it("keeps the model's category when it is known", async () => {
    const { generator } = makeGenerator([
      JSON.stringify({ category: "water_supply", department: "Jal Board", location: "Jaipur" }),
    ]);
    const assistant = new RtiAssistant(generator, await loadTemplates());

    const result = await assistant.classifyComplaint("No water for a week");
    expect(result).toEqual({
      category: "water_supply",
      department: "Jal Board",
      issue_summary: "No water for a week",
      location: "Jaipur",
      duration: "",
      previous_attempts: "",
    });
  });

  it("maps an unknown category or a non-JSON reply to general", async () => {
    const { generator } = makeGenerator([
      JSON.stringify({ category: "traffic" }),
      "I think this is about water.",
    ]);
    const assistant = new RtiAssistant(generator, await loadTemplates());

    expect((await assistant.classifyComplaint("a")).category).toBe("general");
    expect(await assistant.classifyComplaint("b")).toEqual(fallbackClassification("b"));
  });

  it("drafts a full application for a detailed complaint", async () => {
    const templates = await loadTemplates();
    const { generator, complete } = makeGenerator([
      JSON.stringify({ category: "pension_delay" }),
      "RTI APPLICATION TEXT",
      "Your application is ready.",
    ]);
    const assistant = new RtiAssistant(generator, templates);

    const reply = await assistant.handleRequest(
      LONG_COMPLAINT,
      makeProfile({ state: "Bihar" }),
      "en",
    );

    expect(complete).toHaveBeenCalledTimes(3);
    expect(reply).toBe(
      "Your application is ready.\n\nRTI APPLICATION TEXT" +
        submissionInstructions(templates.get("pension_delay")),
    );
    expect(complete.mock.calls[1][0].systemPrompt).toContain("Address: Bihar, [District]");
  });

  it("asks for details when the complaint is short", async () => {
    const { generator, complete } = makeGenerator(["Which office is this about?"]);
    const assistant = new RtiAssistant(generator, await loadTemplates());

    const reply = await assistant.handleRequest("I want to file RTI", makeProfile(), "hi");

    expect(reply).toBe("Which office is this about?");
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].systemPrompt).toContain('Answer in language "hi"');
  });
});
