import { loadConfig, type AppConfig } from "../core/config.js";
import { SchemeCatalog } from "../data-sources/scheme-catalog.js";
import { SessionStore, sessionStoreOptions } from "../data-sources/session-store.js";
import { ensureSqlJs } from "../data-sources/sqlite-adapter.js";
import { SchemeMatcher } from "../domain/schemes/scheme-matcher.js";
import { RtiAssistant } from "../domain/rti/rti-assistant.js";
import { RtiTemplateSet } from "../domain/rti/rti-templates.js";
import { FinancialAdvisor } from "../domain/financial/financial-advisor.js";
import { FinancialGuidance } from "../domain/financial/financial-guidance.js";
import { Orchestrator } from "../domain/conversation/orchestrator.js";
import type { TextGenerator } from "../llm/text-generator.js";
import { OpenAiTextGenerator } from "../llm/openai-generator.js";
import { getErrorMessage, logError, logInfo, logWarn } from "../core/logging.js";
import { KeyedSerializer } from "../core/rate-limiter.js";

export interface ServerContext {
  config: AppConfig;
  catalog: SchemeCatalog;
  matcher: SchemeMatcher;
  generator: TextGenerator;
  rti: RtiAssistant;
  financial: FinancialAdvisor;
  orchestrator: Orchestrator;
  sessionStore: SessionStore | undefined;
  /** One chat turn at a time per session id. */
  sessionTurns: KeyedSerializer;
}

export interface ContextOverrides {
  config?: AppConfig;
  generator?: TextGenerator;
}

/**
 * Create and initialize the full server context.
 * Config and bundled data are fatal when broken; session persistence is not.
 */
export async function createServerContext(
  overrides: ContextOverrides = {},
): Promise<ServerContext> {
  // sql.js WASM must load before any SQLite operations
  await ensureSqlJs();

  const config = overrides.config ?? loadConfig();

  const [catalog, templates, guidance] = await Promise.all([
    SchemeCatalog.load(config.matcher.catalogPath),
    RtiTemplateSet.load(config.reference.rtiTemplatesPath),
    FinancialGuidance.load(config.reference.financialGuidancePath),
  ]);

  if (!config.llm.apiKey && !overrides.generator) {
    logWarn("LLM_API_KEY is not set; chat will fail until it is configured");
  }
  const generator = overrides.generator ?? new OpenAiTextGenerator(config.llm);

  const matcher = new SchemeMatcher(catalog, {
    maxResults: config.matcher.maxResults,
  });
  const rti = new RtiAssistant(generator, templates);
  const financial = new FinancialAdvisor(generator, guidance);
  const orchestrator = new Orchestrator({
    generator,
    matcher,
    rti,
    financial,
    policy: config.profiling,
    supportedLanguages: Object.keys(config.languages.supported),
    recentWindow: config.session.recentWindow,
    explainTopN: config.matcher.explainTopN,
  });

  let sessionStore: SessionStore | undefined;
  try {
    const store = new SessionStore(sessionStoreOptions(config.session));
    store.initialize();
    store.purgeExpired();
    sessionStore = store;
  } catch (err) {
    logError(
      "SessionStore initialization failed (sessions will not persist):",
      getErrorMessage(err),
    );
  }

  logInfo(
    `Context ready: ${catalog.size} schemes, model ${config.llm.model}, sessions ${sessionStore ? "persistent" : "in-memory only"}`,
  );

  return {
    config,
    catalog,
    matcher,
    generator,
    rti,
    financial,
    orchestrator,
    sessionStore,
    sessionTurns: new KeyedSerializer(),
  };
}
