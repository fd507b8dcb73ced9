import {
  AUTO,
  COMMON_LANGUAGE,
  DEFAULT_LANGUAGE,
  LanguageCode,
  isLanguageCode,
  languageProfile,
} from '../config/languages';
import { buildAnswerInstruction, prompt } from '../prompts';
import type {
  AnswerGenerator,
  HistoryEntry,
  PipelineResult,
  RecordingSource,
  SpeechToText,
  TextToSpeech,
  TranscriptionResult,
  Translator,
} from '../types';
import { CollaboratorError, InvalidLanguageError, asCollaborator } from '../utils/errors';
import { callLogger, logger, Logger } from '../utils/logger';
import { resolveLanguage } from './language-resolver';
import { QualityGate } from './quality-gate';
import { fromExternalText, fromProvider } from './transcription';

export interface TurnProcessorDeps {
  recordings: RecordingSource;
  stt: SpeechToText;
  translator: Translator;
  llm: AnswerGenerator;
  tts: TextToSpeech;
  qualityGate: QualityGate;
}

export interface TurnRequest {
  callSid?: string;
  /** Carrier recording to transcribe. Ignored when externalTranscription is set. */
  recordingUrl?: string;
  /** 'auto' or a supported code. */
  sourceLang: string;
  targetLang: string;
  phoneHint?: LanguageCode | null;
  history: readonly HistoryEntry[];
  /** Speech the carrier already recognised; skips speech-to-text. */
  externalTranscription?: string;
  /** Language the carrier recognised externalTranscription in. */
  externalLanguage?: LanguageCode;
}

/**
 * Runs one question through the pipeline: transcription, language resolution,
 * translation to English, answer generation, translation back and synthesis.
 */
export class TurnProcessor {
  constructor(private readonly deps: TurnProcessorDeps) {}

  /** Throws InvalidLanguageError; safe to call before any async work starts. */
  validateLanguages(sourceLang: string, targetLang: string): void {
    if (sourceLang !== AUTO && !isLanguageCode(sourceLang)) {
      throw new InvalidLanguageError('source', sourceLang);
    }
    if (!isLanguageCode(targetLang)) {
      throw new InvalidLanguageError('target', targetLang);
    }
  }

  async processTurn(request: TurnRequest): Promise<PipelineResult> {
    const log = request.callSid ? callLogger(request.callSid) : logger;
    this.validateLanguages(request.sourceLang, request.targetLang);

    log.info('Step 1: Acquiring transcription', { external: request.externalTranscription !== undefined });
    const stt = await this.acquireTranscription(request);
    log.info('Transcribed text', { text: stt.text, reportedLanguage: stt.language, source: stt.source });

    if (!this.deps.qualityGate.isUsable(stt.text)) {
      return this.repeatRequest(stt, request.phoneHint ?? DEFAULT_LANGUAGE, log);
    }

    const language = resolveLanguage(stt.language, stt.text, request.phoneHint);
    log.info('Step 2: Effective language determined', { language });

    let translatedQuery: string | null = null;
    let queryForLlm = stt.text;
    if (language !== COMMON_LANGUAGE) {
      log.info('Step 3: Translating query to English', { from: language });
      translatedQuery = await this.translate(stt.text, language, COMMON_LANGUAGE);
      queryForLlm = translatedQuery;
      log.info('Translated query', { translatedQuery });
    }

    log.info('Step 4: Generating answer', { historyTurns: request.history.length });
    const instruction = buildAnswerInstruction(request.history);
    const llmResponseEn = await asCollaborator('llm', () => this.deps.llm.generate(instruction, queryForLlm));
    if (!llmResponseEn.trim()) {
      throw new CollaboratorError('llm', 'empty answer');
    }
    log.info('LLM response', { llmResponseEn });

    let finalText = llmResponseEn;
    if (language !== COMMON_LANGUAGE) {
      log.info('Step 5: Translating answer back', { to: language });
      finalText = await this.translate(llmResponseEn, COMMON_LANGUAGE, language);
    }

    log.info('Step 6: Synthesizing speech', { language });
    const outputAudio = await this.synthesize(finalText, language);

    return {
      inputLanguage: language,
      transcribedText: stt.text,
      translatedQuery,
      llmResponseEn,
      finalText,
      outputAudio,
      valid: true,
    };
  }

  private async acquireTranscription(request: TurnRequest): Promise<TranscriptionResult> {
    if (request.externalTranscription !== undefined) {
      return fromExternalText(request.externalTranscription, request.externalLanguage);
    }
    const recordingUrl = request.recordingUrl;
    if (!recordingUrl) {
      throw new CollaboratorError('recording', 'no recording or external transcription for this turn');
    }
    const audio = await asCollaborator('recording', () => this.deps.recordings.download(recordingUrl));
    const result = await asCollaborator('stt', () => this.deps.stt.transcribe(audio));
    return fromProvider(result);
  }

  private async repeatRequest(stt: TranscriptionResult, language: LanguageCode, log: Logger): Promise<PipelineResult> {
    log.warn('Transcription rejected by quality gate, asking caller to repeat', { text: stt.text, language });
    const finalText = prompt(language, 'repeat');
    return {
      inputLanguage: language,
      transcribedText: stt.text,
      translatedQuery: null,
      llmResponseEn: '',
      finalText,
      outputAudio: await this.synthesize(finalText, language),
      valid: false,
    };
  }

  private async translate(text: string, from: LanguageCode, to: LanguageCode): Promise<string> {
    const result = await asCollaborator('translate', () =>
      this.deps.translator.translate(text, languageProfile(from).translateTag, languageProfile(to).translateTag),
    );
    return result.translatedText;
  }

  private async synthesize(text: string, language: LanguageCode): Promise<Buffer> {
    const audio = await asCollaborator('tts', () => this.deps.tts.synthesize(text, language));
    if (audio.length === 0) {
      throw new CollaboratorError('tts', 'empty audio payload');
    }
    return audio;
  }
}
