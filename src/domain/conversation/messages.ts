import type { QuestionId } from "../profile/profile-completer.js";

/** Text in Hindi and English; every other language falls back to English. */
interface Localized {
  hi: string;
  en: string;
}

function pick(text: Localized, language: string): string {
  return language === "hi" ? text.hi : text.en;
}

const PROFILE_QUESTIONS: Record<QuestionId, Localized> = {
  age: {
    hi: "🙏 आपकी उम्र कितनी है?",
    en: "🙏 How old are you?",
  },
  gender: {
    hi: "आप पुरुष हैं या महिला?",
    en: "Are you male or female?",
  },
  state: {
    hi: "आप किस राज्य में रहते हैं?",
    en: "Which state do you live in?",
  },
  occupation: {
    hi: "आप क्या काम करते हैं? (किसान, मज़दूर, दुकानदार, छात्र, गृहिणी...)",
    en: "What work do you do? (farmer, labourer, vendor, student, homemaker...)",
  },
  category: {
    hi: "आपकी श्रेणी क्या है? (सामान्य, SC, ST, OBC, अल्पसंख्यक)",
    en: "Which category do you belong to? (General, SC, ST, OBC, Minority)",
  },
  income: {
    hi: "आपके परिवार की सालाना आय लगभग कितनी है?",
    en: "Roughly what is your household's annual income?",
  },
  marital_status: {
    hi: "आपकी वैवाहिक स्थिति क्या है? (विवाहित, अविवाहित, विधवा/विधुर)",
    en: "What is your marital status? (married, single, widowed)",
  },
  bpl: {
    hi: "क्या आपके पास BPL (गरीबी रेखा से नीचे) कार्ड है?",
    en: "Do you have a BPL (Below Poverty Line) card?",
  },
};

const GREETING: Localized = {
  hi: `🙏 नमस्ते! मैं **सहायक** हूँ, आपका डिजिटल साथी।

मैं इन कामों में मदद कर सकता हूँ:

🏛️ **सरकारी योजनाएँ**: अपने बारे में बताइए, मैं आपके लायक योजनाएँ ढूँढूँगा
📝 **RTI / शिकायत**: अपनी समस्या बताइए, मैं RTI आवेदन तैयार कर दूँगा
💰 **लोन और पैसे की सलाह**: लोन, बचत या धोखाधड़ी के बारे में पूछिए

हिंदी, English या अपनी भाषा में लिखिए। 🇮🇳`,
  en: `🙏 Namaste! I am **Sahayak**, your digital helper.

I can help you with:

🏛️ **Government schemes**: tell me about yourself and I will find schemes you qualify for
📝 **RTI / complaints**: describe your problem and I will draft an RTI application
💰 **Loans and money advice**: ask about loans, savings or fraud

Write in Hindi, English or your own language. 🇮🇳`,
};

const PROFILING_INTRO: Localized = {
  hi: "चलिए, आपके लिए सही योजनाएँ ढूँढते हैं! बस कुछ सवालों के जवाब दीजिए:\n\n",
  en: "Let's find the right schemes for you! Just answer a few questions:\n\n",
};

const NEXT_QUESTION_PREFIX: Localized = {
  hi: "धन्यवाद! 👍 अगला सवाल:\n\n",
  en: "Thank you! 👍 Next question:\n\n",
};

const NO_MATCHES: Localized = {
  hi: "माफ़ कीजिए, अभी आपकी जानकारी के हिसाब से कोई योजना नहीं मिली। थोड़ी और जानकारी देंगे तो मैं फिर से खोजूँगा।",
  en: "Sorry, no schemes match your details right now. Share a little more about yourself and I will search again.",
};

export function profileQuestion(id: QuestionId, language: string): string {
  return pick(PROFILE_QUESTIONS[id], language);
}

export function greeting(language: string): string {
  return pick(GREETING, language);
}

/**
 * Question prompt as shown in chat: the first question of an empty profile
 * gets the intro, later ones a short thank-you.
 */
export function questionPrompt(
  id: QuestionId,
  language: string,
  isFirst: boolean,
): string {
  const prefix = isFirst ? PROFILING_INTRO : NEXT_QUESTION_PREFIX;
  return pick(prefix, language) + profileQuestion(id, language);
}

export function noMatchesMessage(language: string): string {
  return pick(NO_MATCHES, language);
}
