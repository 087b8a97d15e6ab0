import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import type { ProfilingPolicy } from "../domain/profile/profile-completer.js";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const DATA_DIR = path.resolve(__dirname, "../../data");

export interface MatcherConfig {
  maxResults: number;
  explainTopN: number;
  catalogPath: string;
}

export interface ReferenceDataConfig {
  rtiTemplatesPath: string;
  financialGuidancePath: string;
}

export interface LlmConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  historyWindow: number;
  rateLimitMs: number;
  maxRetries: number;
  timeoutMs: number;
}

export interface SessionConfig {
  dataDir: string;
  ttlDays: number;
  historyLimit: number;
  recentWindow: number;
}

export interface LanguageConfig {
  supported: Record<string, string>;
  defaultLanguage: string;
}

export interface AppConfig {
  profiling: ProfilingPolicy;
  matcher: MatcherConfig;
  reference: ReferenceDataConfig;
  llm: LlmConfig;
  session: SessionConfig;
  languages: LanguageConfig;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envFloat(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isFinite);
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envString(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

// ============================================================================
// Profiling Policy
// ============================================================================

/**
 * Two thresholds drive progressive profiling: the dialogue stops asking and
 * runs matching at `matchThreshold`, while the completer only reports the
 * profile as complete at `completeThreshold`.
 */
export function loadProfilingPolicy(): ProfilingPolicy {
  return {
    matchThreshold: envFloat("PROFILE_MATCH_THRESHOLD", 0.5),
    completeThreshold: envFloat("PROFILE_COMPLETE_THRESHOLD", 0.8),
  };
}

/**
 * Validate policy invariants at startup.
 * Throws on misconfiguration rather than silently running with broken logic.
 */
export function validateProfilingPolicy(p: ProfilingPolicy): void {
  const errors: string[] = [];

  if (p.matchThreshold < 0 || p.matchThreshold > 1)
    errors.push("matchThreshold must be between 0 and 1");
  if (p.completeThreshold < 0 || p.completeThreshold > 1)
    errors.push("completeThreshold must be between 0 and 1");
  if (p.matchThreshold > p.completeThreshold)
    errors.push("matchThreshold must be <= completeThreshold");

  if (errors.length > 0) {
    throw new Error(
      `Invalid profiling policy:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

// ============================================================================
// Matcher Config
// ============================================================================

export function loadMatcherConfig(): MatcherConfig {
  return {
    maxResults: Math.min(50, Math.max(1, envInt("MATCH_MAX_RESULTS", 7))),
    explainTopN: Math.min(10, Math.max(1, envInt("MATCH_EXPLAIN_TOP_N", 5))),
    catalogPath: path.resolve(
      envString("SCHEME_CATALOG_PATH") ??
        path.join(DATA_DIR, "schemes", "central_schemes.json"),
    ),
  };
}

export function loadReferenceDataConfig(): ReferenceDataConfig {
  return {
    rtiTemplatesPath: path.resolve(
      envString("RTI_TEMPLATES_PATH") ?? path.join(DATA_DIR, "rti-templates.json"),
    ),
    financialGuidancePath: path.resolve(
      envString("FINANCIAL_GUIDANCE_PATH") ??
        path.join(DATA_DIR, "financial-guidance.json"),
    ),
  };
}

// ============================================================================
// Text Generation Config
// ============================================================================

const DEFAULT_MODEL = "gpt-4o-mini";

export function loadLlmConfig(): LlmConfig {
  return {
    apiKey: envString("LLM_API_KEY"),
    baseUrl: envString("LLM_BASE_URL"),
    model: envString("LLM_MODEL") ?? DEFAULT_MODEL,
    maxTokens: envInt("LLM_MAX_TOKENS", 2000),
    temperature: envFloat("LLM_TEMPERATURE", 0.3),
    historyWindow: Math.max(0, envInt("LLM_HISTORY_WINDOW", 6)),
    rateLimitMs: Math.max(0, envInt("LLM_RATE_LIMIT_MS", 250)),
    maxRetries: Math.max(0, Math.min(5, envInt("LLM_MAX_RETRIES", 2))),
    timeoutMs: Math.max(1000, envInt("LLM_TIMEOUT_MS", 60_000)),
  };
}

export function validateLlmConfig(config: LlmConfig): void {
  const errors: string[] = [];

  if (config.baseUrl !== undefined && !config.baseUrl.startsWith("https://")) {
    errors.push("baseUrl must start with https://");
  }
  if (config.maxTokens < 1 || config.maxTokens > 32000) {
    errors.push("maxTokens must be between 1 and 32000");
  }
  if (config.temperature < 0 || config.temperature > 2) {
    errors.push("temperature must be between 0 and 2");
  }

  if (errors.length > 0) {
    throw new Error(
      `Invalid text generation config:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

// ============================================================================
// Session Config
// ============================================================================

export function loadSessionConfig(): SessionConfig {
  return {
    dataDir: path.resolve(envString("SESSION_DATA_DIR") ?? DATA_DIR),
    ttlDays: Math.min(365, Math.max(1, envInt("SESSION_TTL_DAYS", 30))),
    historyLimit: Math.max(2, envInt("SESSION_HISTORY_LIMIT", 20)),
    recentWindow: Math.max(0, envInt("SESSION_RECENT_WINDOW", 10)),
  };
}

// ============================================================================
// Languages
// ============================================================================

export const SUPPORTED_LANGUAGES: Record<string, string> = {
  hi: "Hindi",
  en: "English",
  ta: "Tamil",
  te: "Telugu",
  bn: "Bengali",
  mr: "Marathi",
  gu: "Gujarati",
  kn: "Kannada",
  ml: "Malayalam",
  pa: "Punjabi",
};

/** Own keys only; `constructor` and friends are not language codes. */
export function isSupportedLanguage(
  code: string,
  supported: Readonly<Record<string, string>> = SUPPORTED_LANGUAGES,
): boolean {
  return Object.hasOwn(supported, code);
}

export function loadLanguageConfig(): LanguageConfig {
  const requested = envString("DEFAULT_LANGUAGE");
  return {
    supported: SUPPORTED_LANGUAGES,
    defaultLanguage:
      requested && isSupportedLanguage(requested) ? requested : "hi",
  };
}

/**
 * Loads full application config.
 */
export function loadConfig(): AppConfig {
  const profiling = loadProfilingPolicy();
  validateProfilingPolicy(profiling);
  const llm = loadLlmConfig();
  validateLlmConfig(llm);
  return {
    profiling,
    matcher: loadMatcherConfig(),
    reference: loadReferenceDataConfig(),
    llm,
    session: loadSessionConfig(),
    languages: loadLanguageConfig(),
  };
}
