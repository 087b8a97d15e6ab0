import { logInfo } from "../../core/logging.js";
import {
  assertNoErrors,
  CatalogError,
  readJsonFile,
} from "../../data-sources/json-source.js";

export const RTI_CATEGORIES = [
  "ration_card_delay",
  "pension_delay",
  "road_repair",
  "water_supply",
  "scheme_benefit_not_received",
  "electricity_issue",
  "mgnrega_wage_delay",
  "general",
] as const;

export type RtiCategory = (typeof RTI_CATEGORIES)[number];

export interface RtiTemplate {
  department: string;
  pio: string;
  fee: string;
  questions: string[];
}

export function isRtiCategory(value: unknown): value is RtiCategory {
  return RTI_CATEGORIES.some((c) => c === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTemplate(
  raw: unknown,
  category: string,
  errors: string[],
): RtiTemplate | null {
  if (!isRecord(raw)) {
    errors.push(`${category}: template must be an object`);
    return null;
  }

  const record: Record<string, unknown> = raw;
  const text = (key: string): string => {
    const v = record[key];
    if (typeof v === "string" && v.trim() !== "") return v;
    errors.push(`${category}: "${key}" must be a non-empty string`);
    return "";
  };

  const rawQuestions = Array.isArray(record.questions) ? record.questions : [];
  const questions = rawQuestions.filter((q): q is string => typeof q === "string");
  if (questions.length === 0 || questions.length !== rawQuestions.length) {
    errors.push(`${category}: "questions" must be a non-empty list of strings`);
  }

  return {
    department: text("department"),
    pio: text("pio"),
    fee: text("fee"),
    questions,
  };
}

/**
 * The eight RTI templates, keyed by complaint category. Every category must
 * be present, so lookups never miss.
 */
export class RtiTemplateSet {
  private readonly templates: Readonly<Record<RtiCategory, RtiTemplate>>;

  private constructor(templates: Record<RtiCategory, RtiTemplate>) {
    this.templates = Object.freeze(templates);
  }

  static fromRecords(data: unknown): RtiTemplateSet {
    if (!isRecord(data)) {
      throw new CatalogError("RTI templates must be a JSON object");
    }

    const errors: string[] = [];
    const empty: RtiTemplate = { department: "", pio: "", fee: "", questions: [] };
    const parsed: Record<RtiCategory, RtiTemplate> = {
      ration_card_delay: empty,
      pension_delay: empty,
      road_repair: empty,
      water_supply: empty,
      scheme_benefit_not_received: empty,
      electricity_issue: empty,
      mgnrega_wage_delay: empty,
      general: empty,
    };

    for (const category of RTI_CATEGORIES) {
      if (!(category in data)) {
        errors.push(`${category}: missing`);
        continue;
      }
      const template = parseTemplate(data[category], category, errors);
      if (template) parsed[category] = template;
    }

    assertNoErrors("RTI templates", errors);
    return new RtiTemplateSet(parsed);
  }

  static async load(filePath: string): Promise<RtiTemplateSet> {
    const set = RtiTemplateSet.fromRecords(
      await readJsonFile(filePath, "RTI templates"),
    );
    logInfo(`RTI templates loaded from ${filePath}`);
    return set;
  }

  get(category: RtiCategory): RtiTemplate {
    return this.templates[category];
  }
}
