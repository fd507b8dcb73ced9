import type VoiceResponse from 'twilio/lib/twiml/VoiceResponse';

// Order matters: it is the script-detection tie-break order.
export const LANGUAGE_CODES = ['hi', 'ta', 'te', 'kn', 'ml', 'bn', 'gu', 'pa', 'or', 'mr', 'en'] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

/** What the speech provider reports when it could not tell the language. */
export const AUTO = 'auto';

export interface ScriptBlock {
  start: number;
  end: number;
}

export interface LanguageProfile {
  name: string;
  /** Tag the translation provider expects. */
  translateTag: string;
  /** Unicode block whose characters identify this language's script. */
  script?: ScriptBlock;
  /** Language tag for carrier-spoken prompts. */
  sayLanguage: NonNullable<VoiceResponse.SayAttributes['language']>;
  sayVoice?: VoiceResponse.SayAttributes['voice'];
  /** Recognizer tag for speech captured during <Gather>. */
  gatherLanguage: NonNullable<VoiceResponse.GatherAttributes['language']>;
  /**
   * Whether the carrier recognizer handles this language well enough for its
   * speech result to stand in for a full transcription of the next question.
   */
  speechCapture: boolean;
}

export const LANGUAGES: Record<LanguageCode, LanguageProfile> = {
  hi: {
    name: 'Hindi',
    translateTag: 'hi-IN',
    script: { start: 0x0900, end: 0x097f },
    sayLanguage: 'hi-IN',
    sayVoice: 'Polly.Aditi',
    gatherLanguage: 'hi-IN',
    speechCapture: true,
  },
  ta: {
    name: 'Tamil',
    translateTag: 'ta-IN',
    script: { start: 0x0b80, end: 0x0bff },
    sayLanguage: 'ta-IN',
    gatherLanguage: 'ta-IN',
    speechCapture: true,
  },
  te: {
    name: 'Telugu',
    translateTag: 'te-IN',
    script: { start: 0x0c00, end: 0x0c7f },
    sayLanguage: 'te-IN',
    gatherLanguage: 'te-IN',
    speechCapture: true,
  },
  kn: {
    name: 'Kannada',
    translateTag: 'kn-IN',
    script: { start: 0x0c80, end: 0x0cff },
    sayLanguage: 'kn-IN',
    gatherLanguage: 'kn-IN',
    speechCapture: true,
  },
  ml: {
    name: 'Malayalam',
    translateTag: 'ml-IN',
    script: { start: 0x0d00, end: 0x0d7f },
    sayLanguage: 'ml-IN',
    gatherLanguage: 'ml-IN',
    speechCapture: true,
  },
  bn: {
    name: 'Bengali',
    translateTag: 'bn-IN',
    script: { start: 0x0980, end: 0x09ff },
    sayLanguage: 'bn-IN',
    gatherLanguage: 'bn-IN',
    speechCapture: true,
  },
  gu: {
    name: 'Gujarati',
    translateTag: 'gu-IN',
    script: { start: 0x0a80, end: 0x0aff },
    sayLanguage: 'gu-IN',
    gatherLanguage: 'gu-IN',
    speechCapture: true,
  },
  pa: {
    name: 'Punjabi',
    translateTag: 'pa-IN',
    script: { start: 0x0a00, end: 0x0a7f },
    sayLanguage: 'pa-IN',
    gatherLanguage: 'en-IN',
    speechCapture: false,
  },
  // No carrier voice or recognizer for Odia: prompts are spoken in Indian English.
  or: {
    name: 'Odia',
    translateTag: 'od-IN',
    script: { start: 0x0b00, end: 0x0b7f },
    sayLanguage: 'en-IN',
    sayVoice: 'Polly.Aditi',
    gatherLanguage: 'en-IN',
    speechCapture: false,
  },
  // Devanagari, like Hindi; script detection always attributes it to Hindi.
  mr: {
    name: 'Marathi',
    translateTag: 'mr-IN',
    sayLanguage: 'mr-IN',
    gatherLanguage: 'mr-IN',
    speechCapture: true,
  },
  en: {
    name: 'English',
    translateTag: 'en-IN',
    sayLanguage: 'en-IN',
    sayVoice: 'Polly.Aditi',
    gatherLanguage: 'en-IN',
    speechCapture: true,
  },
};

/** Pivot language for answer generation and stored history. */
export const COMMON_LANGUAGE: LanguageCode = 'en';

/** Used when nothing else resolves, and for callers with no phone hint. */
export const DEFAULT_LANGUAGE: LanguageCode = 'hi';

export function isLanguageCode(value: string | null | undefined): value is LanguageCode {
  return value != null && Object.prototype.hasOwnProperty.call(LANGUAGES, value);
}

export function languageProfile(code: LanguageCode): LanguageProfile {
  return LANGUAGES[code];
}

/** Languages with a script block, in tie-break order. */
export function scriptLanguages(): Array<{ code: LanguageCode; script: ScriptBlock }> {
  const out: Array<{ code: LanguageCode; script: ScriptBlock }> = [];
  for (const code of LANGUAGE_CODES) {
    const script = LANGUAGES[code].script;
    if (script) out.push({ code, script });
  }
  return out;
}
