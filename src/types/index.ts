import type { LanguageCode } from '../config/languages';

export interface ConversationTurn {
  /** Caller's question in the common language. */
  readonly question: string;
  /** Generated answer in the common language. */
  readonly answer: string;
  readonly timestamp: Date;
}

/** Prior question/answer pair passed to answer generation. */
export interface HistoryEntry {
  question: string;
  answer: string;
}

export type TranscriptionResult =
  | {
      source: 'provider';
      text: string;
      /** Provider-reported language code, or 'auto'. */
      language: string;
      confidence: number;
    }
  | {
      source: 'external';
      text: string;
      language: string;
    };

export interface PipelineResult {
  inputLanguage: LanguageCode;
  transcribedText: string;
  translatedQuery: string | null;
  llmResponseEn: string;
  finalText: string;
  outputAudio: Buffer;
  /** False when the quality gate asked the caller to repeat. */
  valid: boolean;
}

// Collaborators consumed by the turn processor.

export interface SpeechToText {
  transcribe(audio: Buffer): Promise<{ text: string; language: string; confidence: number }>;
}

export interface Translator {
  translate(text: string, sourceTag: string, targetTag: string): Promise<{ translatedText: string }>;
}

export interface AnswerGenerator {
  generate(systemInstruction: string, userQuery: string): Promise<string>;
}

export interface TextToSpeech {
  synthesize(text: string, language: LanguageCode): Promise<Buffer>;
}

export interface RecordingSource {
  download(recordingUrl: string): Promise<Buffer>;
}

// Outbound voice script, rendered to TwiML at the HTTP edge.

export interface SpeakAction {
  kind: 'say';
  text: string;
  language: LanguageCode;
}

export interface PlayAction {
  kind: 'play';
  url: string;
}

export interface RecordAction {
  kind: 'record';
  maxLengthSec: number;
  silenceTimeoutSec: number;
  action: string;
}

export interface GatherAction {
  kind: 'gather';
  input: Array<'speech' | 'dtmf'>;
  timeoutSec: number;
  action: string;
  language: LanguageCode;
  hints: string[];
  bargeIn: boolean;
  prompts: Array<SpeakAction | PlayAction>;
}

export interface PauseAction {
  kind: 'pause';
  lengthSec: number;
}

export interface RedirectAction {
  kind: 'redirect';
  url: string;
}

export interface HangupAction {
  kind: 'hangup';
}

export type VoiceAction =
  | SpeakAction
  | PlayAction
  | RecordAction
  | GatherAction
  | PauseAction
  | RedirectAction
  | HangupAction;

export type VoiceScript = VoiceAction[];
