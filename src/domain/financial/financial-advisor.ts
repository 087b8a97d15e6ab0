import type { CitizenProfile } from "../profile/types.js";
import type { TextGenerator } from "../../llm/text-generator.js";
import { withReferenceData } from "../../llm/text-generator.js";
import { profileToRecord } from "../profile/profile.js";
import { logInfo } from "../../core/logging.js";
import type { FinancialGuidance, GovtLoanScheme, ScamPattern } from "./financial-guidance.js";
import { HIGH_RATE, PREDATORY_RATE } from "./loan-math.js";

export interface ScamCheck {
  is_scam: boolean;
  pattern_id?: string;
  alert_hi?: string;
  alert_en?: string;
}

export type RateVerdict = "predatory" | "high" | "reasonable";

export interface InterestAssessment {
  verdict: RateVerdict;
  is_predatory: boolean;
  alert_hi: string;
  alert_en: string;
  alternatives: GovtLoanScheme[];
}

const ALTERNATIVES_SHOWN = 3;

/** First pattern with a keyword contained in the text wins. */
export function detectScam(text: string, patterns: readonly ScamPattern[]): ScamCheck {
  const lower = text.toLowerCase();
  const hit = patterns.find((p) => p.keywords.some((k) => lower.includes(k)));
  if (!hit) return { is_scam: false };
  return {
    is_scam: true,
    pattern_id: hit.id,
    alert_hi: hit.alert_hi,
    alert_en: hit.alert_en,
  };
}

export function assessInterestRate(
  annualRate: number,
  loanSchemes: readonly GovtLoanScheme[],
): InterestAssessment {
  const alternatives = loanSchemes.slice(0, ALTERNATIVES_SHOWN);

  if (annualRate > PREDATORY_RATE) {
    return {
      verdict: "predatory",
      is_predatory: true,
      alert_hi: `⚠️ ख़तरा: ${annualRate}% सालाना ब्याज बहुत ज़्यादा है! यह शोषण वाला कर्ज़ है। सरकारी योजनाओं में 4-9% ब्याज पर लोन मिल सकता है।`,
      alert_en: `⚠️ DANGER: ${annualRate}% a year is far too high. This is predatory lending. Government schemes lend at 4-9%.`,
      alternatives,
    };
  }
  if (annualRate > HIGH_RATE) {
    return {
      verdict: "high",
      is_predatory: false,
      alert_hi: `⚠️ सावधान: ${annualRate}% ब्याज काफ़ी ज़्यादा है। सरकारी योजनाओं में कम ब्याज पर लोन मिलता है।`,
      alert_en: `⚠️ CAUTION: ${annualRate}% interest is high. Government schemes offer lower rates.`,
      alternatives,
    };
  }
  return {
    verdict: "reasonable",
    is_predatory: false,
    alert_hi: `✅ ${annualRate}% सालाना ब्याज ठीक सीमा में है।`,
    alert_en: `✅ ${annualRate}% a year is within a reasonable range.`,
    alternatives: [],
  };
}

export function localizedAlert(
  alert: { alert_hi?: string; alert_en?: string },
  language: string,
): string {
  const en = alert.alert_en ?? "";
  return language === "hi" ? (alert.alert_hi ?? en) : en;
}

function advisorPrompt(
  profile: CitizenProfile,
  language: string,
  loanSchemes: readonly GovtLoanScheme[],
): string {
  const alternatives = loanSchemes
    .map((s) => `- ${s.name}: ${s.rate} interest, ${s.amount}, for ${s.for}`)
    .join("\n");

  const prompt = `You are Sahayak's money advisor. Help the citizen understand loans, savings and fraud.

CITIZEN PROFILE: ${JSON.stringify(profileToRecord(profile))}
LANGUAGE: ${language}

WHAT YOU DO:
1. If they mention a loan amount and rate, work out the EMI and total repayment in exact rupees.
2. Flag rates above ${PREDATORY_RATE}% a year as exploitative and above ${HIGH_RATE}% as high.
3. Warn about OTP scams, advance-fee fraud and fake lotteries.
4. Suggest the government loan schemes in the reference data as cheaper options.
5. Explain savings options such as Sukanya Samriddhi, PPF and PM Jan Dhan when relevant.

RULES:
- Give rupee amounts, not only percentages.
- Convert monthly rates to annual (5% a month is 60% a year) and flag them.
- Compare moneylender rates with government rates.
- Use simple everyday words and answer in the citizen's language.`;

  return withReferenceData(prompt, `GOVERNMENT LOAN ALTERNATIVES:\n${alternatives}`);
}

/**
 * Financial literacy handler: local scam check first, then the model with
 * the government alternatives as reference.
 */
export class FinancialAdvisor {
  private generator: TextGenerator;
  private guidance: FinancialGuidance;

  constructor(generator: TextGenerator, guidance: FinancialGuidance) {
    this.generator = generator;
    this.guidance = guidance;
  }

  checkScam(text: string): ScamCheck {
    return detectScam(text, this.guidance.scamPatterns);
  }

  assessRate(annualRate: number): InterestAssessment {
    return assessInterestRate(annualRate, this.guidance.loanSchemes);
  }

  async handleQuery(
    message: string,
    profile: CitizenProfile,
    language: string,
  ): Promise<string> {
    const scam = this.checkScam(message);
    if (scam.is_scam) {
      logInfo(`Scam pattern matched: ${scam.pattern_id ?? "unknown"}`);
      return localizedAlert(scam, language);
    }

    return this.generator.complete({
      systemPrompt: advisorPrompt(profile, language, this.guidance.loanSchemes),
      userMessage: message,
    });
  }
}
