import {
  CATEGORIES,
  CRITICAL_FIELDS,
  EDUCATION_LEVELS,
  GENDERS,
  MARITAL_STATUSES,
  OCCUPATIONS,
  PROFILE_FIELD_NAMES,
  type CitizenProfile,
  type ProfileField,
  type ProfileUpdateResult,
} from "./types.js";

export function emptyProfile(): CitizenProfile {
  return {
    age: null,
    gender: null,
    state: null,
    district: null,
    occupation: null,
    category: null,
    annual_income: null,
    bpl_status: null,
    disability: null,
    marital_status: null,
    land_ownership: null,
    education_level: null,
    family_members: null,
    children_count: null,
    children_in_school: null,
    pregnant_in_family: null,
    senior_in_family: null,
  };
}

/**
 * Fraction of the six critical fields that are known, in [0, 1].
 */
export function completenessScore(profile: CitizenProfile): number {
  const filled = CRITICAL_FIELDS.filter((f) => profile[f] !== null).length;
  return filled / CRITICAL_FIELDS.length;
}

/** Known fields only: the shape handed to prompts and tool responses. */
export function profileToRecord(
  profile: CitizenProfile,
): Partial<Record<ProfileField, string | number | boolean>> {
  const out: Partial<Record<ProfileField, string | number | boolean>> = {};
  for (const field of PROFILE_FIELD_NAMES) {
    const value = profile[field];
    if (value !== null) out[field] = value;
  }
  return out;
}

// ============================================================================
// Field coercion
// ============================================================================

type Coercer<K extends ProfileField> = (
  raw: unknown,
) => CitizenProfile[K] | undefined;

function toInt(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? raw : undefined;
  }
  if (typeof raw === "string") {
    const cleaned = raw.replace(/[,\s]/g, "");
    if (/^-?\d+$/.test(cleaned)) return parseInt(cleaned, 10);
  }
  return undefined;
}

function toText(raw: unknown): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
}

function toBool(raw: unknown): boolean | undefined {
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "string") {
    const v = raw.trim().toLowerCase();
    if (["true", "yes", "haan", "1"].includes(v)) return true;
    if (["false", "no", "nahi", "0"].includes(v)) return false;
  }
  return undefined;
}

function toEnum<T extends string>(
  values: readonly T[],
): (raw: unknown) => T | undefined {
  return (raw) => {
    if (typeof raw !== "string") return undefined;
    const v = raw.trim().toLowerCase();
    return values.find((allowed) => allowed === v);
  };
}

const COERCERS: { [K in ProfileField]: Coercer<K> } = {
  age: toInt,
  gender: toEnum(GENDERS),
  state: toText,
  district: toText,
  occupation: toEnum(OCCUPATIONS),
  category: toEnum(CATEGORIES),
  annual_income: toInt,
  bpl_status: toBool,
  disability: toBool,
  marital_status: toEnum(MARITAL_STATUSES),
  land_ownership: toBool,
  education_level: toEnum(EDUCATION_LEVELS),
  family_members: toInt,
  children_count: toInt,
  children_in_school: toBool,
  pregnant_in_family: toBool,
  senior_in_family: toBool,
};

export function isProfileField(key: string): key is ProfileField {
  return PROFILE_FIELD_NAMES.some((f) => f === key);
}

function setField<K extends ProfileField>(
  profile: CitizenProfile,
  field: K,
  raw: unknown,
): boolean {
  const value = COERCERS[field](raw);
  if (value === undefined) return false;
  profile[field] = value;
  return true;
}

/**
 * Apply extracted facts to a profile without mutating the input.
 *
 * `null` values are skipped (the extractor saying "not mentioned" must not
 * erase a known fact). Unknown keys and wrongly-shaped values are rejected.
 * Plausibility (negative ages and the like) is the extractor's concern.
 */
export function applyProfileUpdates(
  profile: CitizenProfile,
  updates: Record<string, unknown>,
): ProfileUpdateResult {
  const next: CitizenProfile = { ...profile };
  const applied: ProfileField[] = [];
  const rejected: string[] = [];

  for (const [key, raw] of Object.entries(updates)) {
    if (raw === null || raw === undefined) continue;
    if (!isProfileField(key)) {
      rejected.push(key);
      continue;
    }
    if (setField(next, key, raw)) {
      applied.push(key);
    } else {
      rejected.push(key);
    }
  }

  return { profile: next, applied, rejected };
}

/** Build a profile from an untyped record (tool input, persisted JSON). */
export function profileFromRecord(
  record: Record<string, unknown>,
): ProfileUpdateResult {
  return applyProfileUpdates(emptyProfile(), record);
}
