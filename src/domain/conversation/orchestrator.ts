import type { TextGenerator } from "../../llm/text-generator.js";
import type { SchemeMatcher } from "../schemes/scheme-matcher.js";
import type { MatchedSchemeSummary } from "../schemes/types.js";
import type { RtiAssistant } from "../rti/rti-assistant.js";
import type { FinancialAdvisor } from "../financial/financial-advisor.js";
import type { ProfilingPolicy } from "../profile/profile-completer.js";
import { DEFAULT_PROFILING_POLICY, profilingStep } from "../profile/profile-completer.js";
import { applyProfileUpdates } from "../profile/profile.js";
import { summarizeMatches } from "../schemes/scheme-matcher.js";
import { DEFAULT_EXPLAIN_TOP_N, explainSchemes } from "../schemes/scheme-explainer.js";
import { SUPPORTED_LANGUAGES } from "../../core/config.js";
import { logDebug, logWarn } from "../../core/logging.js";
import { detectIntent } from "./intent.js";
import { greeting, questionPrompt } from "./messages.js";
import { addMessage, recentHistory, type Pillar, type Session } from "./session.js";

export interface OrchestratorDeps {
  generator: TextGenerator;
  matcher: SchemeMatcher;
  rti: RtiAssistant;
  financial: FinancialAdvisor;
  policy?: ProfilingPolicy;
  supportedLanguages?: readonly string[];
  /** Messages handed to intent detection. */
  recentWindow?: number;
  explainTopN?: number;
}

export interface OrchestratorReply {
  text: string;
  language: string;
  pillar: Pillar;
  schemes: MatchedSchemeSummary[];
  session: Session;
}

/**
 * One conversational turn: classify, fold extracted details into the
 * profile, route to a pillar, record both sides of the exchange.
 * Mutates the session it is given; persisting it is the caller's job.
 */
export class Orchestrator {
  private deps: OrchestratorDeps;
  private policy: ProfilingPolicy;
  private languages: ReadonlySet<string>;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.policy = deps.policy ?? DEFAULT_PROFILING_POLICY;
    this.languages = new Set(deps.supportedLanguages ?? Object.keys(SUPPORTED_LANGUAGES));
  }

  async processMessage(session: Session, message: string): Promise<OrchestratorReply> {
    const detected = await detectIntent(
      this.deps.generator,
      message,
      recentHistory(session, this.deps.recentWindow ?? 10),
    );

    if (detected.language_detected && this.languages.has(detected.language_detected)) {
      session.language = detected.language_detected;
    }
    const language = session.language;

    const update = applyProfileUpdates(session.profile, detected.profile_updates);
    session.profile = update.profile;
    if (update.rejected.length > 0) {
      logWarn(`Ignored profile updates: ${update.rejected.join(", ")}`);
    }
    if (update.applied.length > 0) {
      logDebug(`Profile updated: ${update.applied.join(", ")}`);
    }

    addMessage(session, "user", message);

    let text: string;
    switch (detected.intent) {
      case "greeting":
        session.current_pillar = "greeting";
        text = greeting(language);
        break;
      case "scheme_discovery":
      case "profile_update":
        session.current_pillar = "scheme_discovery";
        text = await this.continuePillar(session, message, language);
        break;
      case "rti":
      case "financial":
        session.current_pillar = detected.intent;
        text = await this.continuePillar(session, message, language);
        break;
      default:
        text = await this.continuePillar(session, message, language);
    }

    addMessage(session, "assistant", text);

    return {
      text,
      language,
      pillar: session.current_pillar,
      schemes: session.matched_schemes,
      session,
    };
  }

  private async continuePillar(
    session: Session,
    message: string,
    language: string,
  ): Promise<string> {
    switch (session.current_pillar) {
      case "scheme_discovery":
        return this.schemeDiscovery(session, language);
      case "rti":
        return this.deps.rti.handleRequest(message, session.profile, language);
      case "financial":
        return this.deps.financial.handleQuery(message, session.profile, language);
      case "greeting":
        return greeting(language);
    }
  }

  private async schemeDiscovery(session: Session, language: string): Promise<string> {
    const step = profilingStep(session.profile, this.policy);

    if (step.kind === "ask") {
      return questionPrompt(step.question, language, step.completeness === 0);
    }

    const matches = this.deps.matcher.match(session.profile);
    session.matched_schemes = summarizeMatches(matches);
    logDebug(`Matched ${matches.length} scheme(s) at completeness ${step.completeness.toFixed(2)}`);

    return explainSchemes(
      this.deps.generator,
      matches,
      session.profile,
      language,
      this.deps.explainTopN ?? DEFAULT_EXPLAIN_TOP_N,
    );
  }
}
