import type { CitizenProfile } from "../profile/types.js";
import type { TextGenerator } from "../../llm/text-generator.js";
import { parseJsonReply } from "../../llm/text-generator.js";
import { profileToRecord } from "../profile/profile.js";
import { logDebug, logWarn } from "../../core/logging.js";
import {
  isRtiCategory,
  RTI_CATEGORIES,
  type RtiCategory,
  type RtiTemplate,
  type RtiTemplateSet,
} from "./rti-templates.js";

export interface ComplaintClassification {
  category: RtiCategory;
  department: string;
  issue_summary: string;
  location: string;
  duration: string;
  previous_attempts: string;
}

export interface RtiDraft {
  classification: ComplaintClassification;
  template: RtiTemplate;
  application: string;
  instructions: string;
}

/** Complaints longer than this many words are drafted straight away. */
export const DRAFT_MIN_WORDS = 10;
const SUMMARY_MAX_CHARS = 200;

const CLASSIFY_PROMPT = `You are an expert on India's Right to Information Act. Classify the citizen's complaint.

Reply with exactly one JSON object and nothing else:
{
  "category": one of ${JSON.stringify(RTI_CATEGORIES)},
  "department": "the specific government department",
  "issue_summary": "one-line summary of the issue",
  "location": "city, district or state mentioned",
  "duration": "how long the problem has lasted",
  "previous_attempts": "earlier complaints mentioned, if any"
}`;

export function fallbackClassification(text: string): ComplaintClassification {
  return {
    category: "general",
    department: "Concerned department",
    issue_summary: text.slice(0, SUMMARY_MAX_CHARS),
    location: "",
    duration: "",
    previous_attempts: "",
  };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w !== "").length;
}

function field(parsed: Record<string, unknown>, key: string, fallback: string): string {
  const v = parsed[key];
  return typeof v === "string" ? v : fallback;
}

export function submissionInstructions(template: RtiTemplate): string {
  return `

📋 **HOW TO SUBMIT THIS RTI:**

1. **Online:** open rtionline.gov.in, choose "Submit Request", pick the department, paste this application and pay the fee online
2. **By post:** print it, attach a ₹10 postal order or DD, and send it by registered post to the PIO
3. **In person:** take the application and the ₹10 fee to the PIO's office

⏰ **Timeline:** a reply is due within 30 days. If none comes, you can file a First Appeal.
💡 **Tip:** keep a copy of the application and the acknowledgment receipt.
🆓 **BPL citizens:** no fee. Attach your BPL certificate instead.

Department: ${template.department}
PIO: ${template.pio}
`;
}

function draftingPrompt(
  complaint: string,
  classification: ComplaintClassification,
  template: RtiTemplate,
  profile: CitizenProfile,
): string {
  return `You draft formal RTI applications for Indian citizens.

COMPLAINT: ${complaint}
CLASSIFICATION: ${JSON.stringify(classification)}
DEPARTMENT: ${template.department}
PIO: ${template.pio}
FEE: ${template.fee}
SUGGESTED QUESTIONS: ${JSON.stringify(template.questions)}

APPLICANT:
Name: [Applicant's name]
Address: ${profile.state ?? "[State]"}, ${profile.district ?? "[District]"}

Write a complete application under Section 6(1) of the Right to Information Act, 2005, addressed to the Public Information Officer of the department, with:
- a subject line naming the issue
- 4 to 6 numbered questions specific to this complaint, built from the suggested questions
- the fee line (${template.fee}), and the Section 7(5) BPL exemption line as an optional paragraph
- a request for a reply within the statutory 30 days
- signature block with name, address, phone and date placeholders, and a list of enclosures

Write the application in English; it is a legal document.`;
}

/**
 * Turns plain-language grievances into RTI applications. The model
 * classifies and drafts; department, PIO and fee come from the templates.
 */
export class RtiAssistant {
  private generator: TextGenerator;
  private templates: RtiTemplateSet;

  constructor(generator: TextGenerator, templates: RtiTemplateSet) {
    this.generator = generator;
    this.templates = templates;
  }

  async classifyComplaint(text: string): Promise<ComplaintClassification> {
    const reply = await this.generator.complete({
      systemPrompt: CLASSIFY_PROMPT,
      userMessage: text,
    });

    const parsed = parseJsonReply(reply);
    if (!parsed) {
      logWarn("Complaint classifier returned non-JSON; using general template");
      return fallbackClassification(text);
    }

    const fallback = fallbackClassification(text);
    return {
      category: isRtiCategory(parsed.category) ? parsed.category : "general",
      department: field(parsed, "department", fallback.department),
      issue_summary: field(parsed, "issue_summary", fallback.issue_summary),
      location: field(parsed, "location", ""),
      duration: field(parsed, "duration", ""),
      previous_attempts: field(parsed, "previous_attempts", ""),
    };
  }

  async draftApplication(
    complaint: string,
    profile: CitizenProfile,
  ): Promise<RtiDraft> {
    const classification = await this.classifyComplaint(complaint);
    const template = this.templates.get(classification.category);
    logDebug(`RTI complaint classified as ${classification.category}`);

    const application = await this.generator.complete({
      systemPrompt: draftingPrompt(complaint, classification, template, profile),
      userMessage: complaint,
    });

    return {
      classification,
      template,
      application,
      instructions: submissionInstructions(template),
    };
  }

  /**
   * Chat entry point. A substantial complaint gets a plain-language summary
   * followed by the full draft; anything shorter gets guidance or
   * clarifying questions.
   */
  async handleRequest(
    message: string,
    profile: CitizenProfile,
    language: string,
  ): Promise<string> {
    if (countWords(message) > DRAFT_MIN_WORDS) {
      const draft = await this.draftApplication(message, profile);
      const explanation = await this.generator.complete({
        systemPrompt: `Explain to the citizen, in simple words and in language "${language}":
1. that their RTI application is ready
2. what the complaint is about, in one line
3. that it goes to ${draft.template.department}
4. that the fee is ${draft.template.fee} (free for BPL card holders)
5. that a reply is due within 30 days
6. ask whether they want to change anything
Keep it warm and encouraging.`,
        userMessage: message,
      });
      return `${explanation}\n\n${draft.application}${draft.instructions}`;
    }

    return this.generator.complete({
      systemPrompt: `You are Sahayak's RTI helper. The citizen wants to file an RTI application or a grievance.

CITIZEN PROFILE: ${JSON.stringify(profileToRecord(profile))}

Work out what they need:
1. A clear complaint: explain that you can draft the RTI once they describe it in a few sentences.
2. A vague complaint: ask which department, what happened, when and where.
3. A question about RTI itself: explain what RTI is and how it works.

Answer in language "${language}". Be kind and encouraging.`,
      userMessage: message,
    });
  }
}
