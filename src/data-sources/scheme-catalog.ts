import { logInfo } from "../core/logging.js";
import type {
  EligibilityRules,
  Scheme,
  SchemeListing,
} from "../domain/schemes/types.js";

import { assertNoErrors, CatalogError, readJsonFile } from "./json-source.js";

export { CatalogError };

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function reqString(raw: RawRecord, key: string, where: string, errors: string[]): string {
  const val = raw[key];
  if (typeof val === "string" && val.trim() !== "") return val;
  errors.push(`${where}: "${key}" must be a non-empty string`);
  return "";
}

function optString(raw: RawRecord, key: string): string {
  const val = raw[key];
  return typeof val === "string" ? val : "";
}

const NUMBER_RULES = ["age_min", "age_max", "income_max"] as const;
const LIST_RULES = [
  "gender",
  "states",
  "occupations",
  "categories",
  "marital_status",
] as const;
const FLAG_RULES = [
  "bpl_required",
  "disability_required",
  "disability",
  "land_required",
] as const;

/**
 * Parse an eligibility block. Unrecognized keys are dropped (they never
 * disqualify); recognized keys with the wrong type are catalog errors.
 */
function parseRules(raw: unknown, where: string, errors: string[]): EligibilityRules {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    errors.push(`${where}: "eligibility" must be an object`);
    return {};
  }

  const rules: EligibilityRules = {};

  for (const key of NUMBER_RULES) {
    const val = raw[key];
    if (val === undefined) continue;
    if (typeof val === "number" && Number.isFinite(val)) rules[key] = val;
    else errors.push(`${where}: eligibility.${key} must be a number`);
  }

  for (const key of LIST_RULES) {
    const val = raw[key];
    if (val === undefined) continue;
    if (isStringArray(val)) rules[key] = val;
    else errors.push(`${where}: eligibility.${key} must be an array of strings`);
  }

  for (const key of FLAG_RULES) {
    const val = raw[key];
    if (val === undefined) continue;
    if (typeof val === "boolean") rules[key] = val;
    else errors.push(`${where}: eligibility.${key} must be a boolean`);
  }

  return rules;
}

function parseScheme(raw: unknown, index: number, errors: string[]): Scheme | null {
  const where = `scheme[${index}]`;
  if (!isRecord(raw)) {
    errors.push(`${where}: must be an object`);
    return null;
  }

  const documents = raw.documents;
  if (documents !== undefined && !isStringArray(documents)) {
    errors.push(`${where}: "documents" must be an array of strings`);
  }

  return {
    scheme_id: reqString(raw, "scheme_id", where, errors),
    name: reqString(raw, "name", where, errors),
    name_hi: optString(raw, "name_hi"),
    ministry: optString(raw, "ministry"),
    description: optString(raw, "description"),
    benefit_amount: reqString(raw, "benefit_amount", where, errors),
    benefit_type: optString(raw, "benefit_type"),
    eligibility: parseRules(raw.eligibility, where, errors),
    how_to_apply: reqString(raw, "how_to_apply", where, errors),
    apply_url: optString(raw, "apply_url"),
    documents: isStringArray(documents) ? documents : [],
  };
}

function freezeScheme(scheme: Scheme): Scheme {
  Object.freeze(scheme.documents);
  for (const val of Object.values(scheme.eligibility)) {
    if (Array.isArray(val)) Object.freeze(val);
  }
  Object.freeze(scheme.eligibility);
  return Object.freeze(scheme);
}

/**
 * Read-only scheme catalog. Built once, shared by every matching call.
 */
export class SchemeCatalog {
  private readonly schemes: readonly Scheme[];
  private readonly byId: Map<string, Scheme>;

  private constructor(schemes: Scheme[]) {
    this.schemes = Object.freeze(schemes.map(freezeScheme));
    this.byId = new Map(this.schemes.map((s) => [s.scheme_id, s]));
  }

  /** Validate parsed JSON and build a catalog. Throws CatalogError listing every problem. */
  static fromRecords(data: unknown): SchemeCatalog {
    if (!Array.isArray(data)) {
      throw new CatalogError("Scheme catalog must be a JSON array");
    }

    const errors: string[] = [];
    const schemes: Scheme[] = [];
    const seen = new Set<string>();

    data.forEach((raw, i) => {
      const scheme = parseScheme(raw, i, errors);
      if (!scheme) return;
      if (scheme.scheme_id && seen.has(scheme.scheme_id)) {
        errors.push(`scheme[${i}]: duplicate scheme_id "${scheme.scheme_id}"`);
      }
      seen.add(scheme.scheme_id);
      schemes.push(scheme);
    });

    assertNoErrors("scheme catalog", errors);
    return new SchemeCatalog(schemes);
  }

  static async load(filePath: string): Promise<SchemeCatalog> {
    const data = await readJsonFile(filePath, "scheme catalog");
    const catalog = SchemeCatalog.fromRecords(data);
    logInfo(`Scheme catalog loaded: ${catalog.size} schemes from ${filePath}`);
    return catalog;
  }

  get size(): number {
    return this.schemes.length;
  }

  /** Schemes in catalog order. */
  all(): readonly Scheme[] {
    return this.schemes;
  }

  getById(schemeId: string): Scheme | undefined {
    return this.byId.get(schemeId);
  }

  listings(): SchemeListing[] {
    return this.schemes.map((s) => ({
      id: s.scheme_id,
      name: s.name,
      name_hi: s.name_hi,
      benefit: s.benefit_amount,
      ministry: s.ministry,
      type: s.benefit_type,
      apply_url: s.apply_url,
    }));
  }
}
