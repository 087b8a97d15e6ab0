import type { ToolDefinition } from "./tool-registry.js";
import {
  argNumber,
  argRecord,
  argString,
  argStringOpt,
  formatToolResponse,
  toolError,
} from "./tool-registry.js";
import { completenessScore, profileFromRecord } from "../domain/profile/profile.js";
import { nextQuestion } from "../domain/profile/profile-completer.js";
import { profileQuestion } from "../domain/conversation/messages.js";
import { compactMatch, eligibilityAudit } from "./response-formatter.js";

const ATTRIBUTION = "Bundled central government scheme catalog";

const PROFILE_SCHEMA = {
  type: "object",
  description:
    "Citizen profile. Known fields: age, gender, state, district, occupation, category, annual_income, bpl_status, disability, marital_status, land_ownership, education_level, family_members, children_count, children_in_school, pregnant_in_family, senior_in_family. Omit unknown fields.",
} as const;

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "match_schemes",
      description:
        "Match a citizen profile against the scheme catalog. Filters out schemes whose hard eligibility rules the profile fails (unknown facts never disqualify), scores the rest 50-100 and returns them best first with the score breakdown.",
      inputSchema: {
        type: "object",
        properties: {
          profile: PROFILE_SCHEMA,
          max_results: {
            type: "number",
            description: "Max schemes to return (default 7).",
          },
        },
        required: ["profile"],
      },
      handler: async (args, ctx) => {
        const { profile, rejected } = profileFromRecord(argRecord(args, "profile") ?? {});
        const limit = argNumber(args, "max_results") ?? ctx.config.matcher.maxResults;
        const matches = ctx.matcher.match(profile, limit);

        return formatToolResponse({
          success: true,
          data: {
            profile_completeness: completenessScore(profile),
            ignored_fields: rejected,
            total: matches.length,
            matches: matches.map((m) => compactMatch(m, profile)),
          },
          attribution: ATTRIBUTION,
        });
      },
    },
    {
      name: "next_profile_question",
      description:
        "Next question to ask when building a citizen profile, in priority order (age, gender, state, occupation, category, income, marital status, BPL). Returns complete: true once the profile is complete enough.",
      inputSchema: {
        type: "object",
        properties: {
          profile: PROFILE_SCHEMA,
          language: {
            type: "string",
            description: 'Language for the question text: "hi" (default) or "en".',
          },
        },
      },
      handler: async (args, ctx) => {
        const { profile } = profileFromRecord(argRecord(args, "profile") ?? {});
        const language =
          argStringOpt(args, "language") ?? ctx.config.languages.defaultLanguage;
        const question = nextQuestion(profile, ctx.config.profiling);

        return formatToolResponse({
          success: true,
          data: {
            completeness: completenessScore(profile),
            complete: question === null,
            question_id: question,
            question: question === null ? null : profileQuestion(question, language),
          },
          attribution: "",
        });
      },
    },
    {
      name: "list_schemes",
      description: "List every scheme in the catalog with its benefit and ministry.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) =>
        formatToolResponse({
          success: true,
          data: { total: ctx.catalog.size, schemes: ctx.catalog.listings() },
          attribution: ATTRIBUTION,
        }),
    },
    {
      name: "check_eligibility",
      description:
        "Audit one scheme against a profile: every rule with PASS, FAIL or SKIPPED (fact unknown or no restriction), the first blocking rule, and the relevance score when eligible.",
      inputSchema: {
        type: "object",
        properties: {
          scheme_id: {
            type: "string",
            description: 'Catalog id of the scheme (see list_schemes), e.g. "pm-kisan".',
          },
          profile: PROFILE_SCHEMA,
        },
        required: ["scheme_id", "profile"],
      },
      handler: async (args, ctx) => {
        const schemeId = argString(args, "scheme_id");
        if (!schemeId) return toolError("scheme_id is required.");

        const scheme = ctx.catalog.getById(schemeId);
        if (!scheme) return toolError(`Scheme "${schemeId}" not found.`);

        const { profile } = profileFromRecord(argRecord(args, "profile") ?? {});
        return formatToolResponse({
          success: true,
          data: eligibilityAudit(scheme, profile),
          attribution: ATTRIBUTION,
        });
      },
    },
  ];
}
