// Citizen Profile Types

export const GENDERS = ["male", "female", "other"] as const;
export const OCCUPATIONS = [
  "farmer",
  "labourer",
  "vendor",
  "student",
  "homemaker",
  "unemployed",
  "other",
] as const;
export const CATEGORIES = ["general", "sc", "st", "obc", "minority"] as const;
export const MARITAL_STATUSES = [
  "married",
  "widowed",
  "single",
  "divorced",
] as const;
export const EDUCATION_LEVELS = [
  "none",
  "primary",
  "secondary",
  "graduate",
] as const;

export type Gender = (typeof GENDERS)[number];
export type Occupation = (typeof OCCUPATIONS)[number];
export type Category = (typeof CATEGORIES)[number];
export type MaritalStatus = (typeof MARITAL_STATUSES)[number];
export type EducationLevel = (typeof EDUCATION_LEVELS)[number];

/**
 * Everything known about a citizen, built up turn by turn.
 * `null` always means "not known yet" and is never a business default.
 */
export interface CitizenProfile {
  age: number | null;
  gender: Gender | null;
  state: string | null;
  district: string | null;
  occupation: Occupation | null;
  category: Category | null;
  annual_income: number | null; // INR per year
  bpl_status: boolean | null;
  disability: boolean | null;
  marital_status: MaritalStatus | null;
  land_ownership: boolean | null;
  education_level: EducationLevel | null;
  family_members: number | null;
  children_count: number | null;
  children_in_school: boolean | null;
  pregnant_in_family: boolean | null;
  senior_in_family: boolean | null;
}

export type ProfileField = keyof CitizenProfile;

export const PROFILE_FIELD_NAMES: readonly ProfileField[] = [
  "age",
  "gender",
  "state",
  "district",
  "occupation",
  "category",
  "annual_income",
  "bpl_status",
  "disability",
  "marital_status",
  "land_ownership",
  "education_level",
  "family_members",
  "children_count",
  "children_in_school",
  "pregnant_in_family",
  "senior_in_family",
];

/** Fields that count toward the completeness score. */
export const CRITICAL_FIELDS: readonly ProfileField[] = [
  "age",
  "gender",
  "state",
  "occupation",
  "category",
  "annual_income",
];

export interface ProfileUpdateResult {
  profile: CitizenProfile;
  applied: ProfileField[];
  rejected: string[]; // unknown keys or values of the wrong shape
}
