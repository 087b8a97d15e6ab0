import { logInfo } from "../../core/logging.js";
import {
  assertNoErrors,
  CatalogError,
  readJsonFile,
} from "../../data-sources/json-source.js";

export interface ScamPattern {
  id: string;
  /** Lowercase substrings; any one of them triggers the alert. */
  keywords: string[];
  alert_hi: string;
  alert_en: string;
}

export interface GovtLoanScheme {
  name: string;
  rate: string;
  amount: string;
  for: string;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function strings(raw: RawRecord, keys: readonly string[], where: string, errors: string[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const key of keys) {
    const v = raw[key];
    if (typeof v === "string" && v.trim() !== "") {
      out.set(key, v);
    } else {
      errors.push(`${where}: "${key}" must be a non-empty string`);
      out.set(key, "");
    }
  }
  return out;
}

function parseScamPattern(raw: unknown, i: number, errors: string[]): ScamPattern | null {
  const where = `scam_patterns[${i}]`;
  if (!isRecord(raw)) {
    errors.push(`${where}: must be an object`);
    return null;
  }

  const s = strings(raw, ["id", "alert_hi", "alert_en"], where, errors);
  const rawKeywords = Array.isArray(raw.keywords) ? raw.keywords : [];
  const keywords = rawKeywords
    .filter((k): k is string => typeof k === "string" && k.trim() !== "")
    .map((k) => k.toLowerCase());
  if (keywords.length === 0 || keywords.length !== rawKeywords.length) {
    errors.push(`${where}: "keywords" must be a non-empty list of strings`);
  }

  return {
    id: s.get("id") ?? "",
    keywords,
    alert_hi: s.get("alert_hi") ?? "",
    alert_en: s.get("alert_en") ?? "",
  };
}

function parseLoanScheme(raw: unknown, i: number, errors: string[]): GovtLoanScheme | null {
  const where = `govt_loan_schemes[${i}]`;
  if (!isRecord(raw)) {
    errors.push(`${where}: must be an object`);
    return null;
  }
  const s = strings(raw, ["name", "rate", "amount", "for"], where, errors);
  return {
    name: s.get("name") ?? "",
    rate: s.get("rate") ?? "",
    amount: s.get("amount") ?? "",
    for: s.get("for") ?? "",
  };
}

function parseList<T>(
  raw: unknown,
  key: string,
  parse: (item: unknown, i: number, errors: string[]) => T | null,
  errors: string[],
): T[] {
  if (!Array.isArray(raw)) {
    errors.push(`"${key}" must be a list`);
    return [];
  }
  const out: T[] = [];
  raw.forEach((item, i) => {
    const parsed = parse(item, i, errors);
    if (parsed) out.push(parsed);
  });
  return out;
}

/** Scam keyword patterns and cheaper government loan alternatives. */
export class FinancialGuidance {
  readonly scamPatterns: readonly ScamPattern[];
  readonly loanSchemes: readonly GovtLoanScheme[];

  private constructor(scamPatterns: ScamPattern[], loanSchemes: GovtLoanScheme[]) {
    this.scamPatterns = Object.freeze(scamPatterns);
    this.loanSchemes = Object.freeze(loanSchemes);
  }

  static fromRecords(data: unknown): FinancialGuidance {
    if (!isRecord(data)) {
      throw new CatalogError("Financial guidance must be a JSON object");
    }
    const errors: string[] = [];
    const patterns = parseList(data.scam_patterns, "scam_patterns", parseScamPattern, errors);
    const schemes = parseList(data.govt_loan_schemes, "govt_loan_schemes", parseLoanScheme, errors);
    assertNoErrors("financial guidance", errors);
    return new FinancialGuidance(patterns, schemes);
  }

  static async load(filePath: string): Promise<FinancialGuidance> {
    const guidance = FinancialGuidance.fromRecords(
      await readJsonFile(filePath, "financial guidance"),
    );
    logInfo(
      `Financial guidance loaded: ${guidance.scamPatterns.length} scam patterns, ${guidance.loanSchemes.length} loan schemes`,
    );
    return guidance;
  }
}
