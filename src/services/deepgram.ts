import { z } from 'zod';
import { AUTO, isLanguageCode } from '../config/languages';
import type { SpeechToText } from '../types';
import { CollaboratorError } from '../utils/errors';
import { DEFAULT_TIMEOUT_MS, ensureOk, readJson } from '../utils/http';
import { logger } from '../utils/logger';

const BASE_URL = 'https://api.deepgram.com/v1';

/** Text reported for recordings that contain no speech. The quality gate rejects it. */
export const SILENCE_MARKER = '[SILENCE_DETECTED]';

const listenResponseSchema = z.object({
  results: z.object({
    channels: z
      .array(
        z.object({
          detected_language: z.string().optional(),
          alternatives: z.array(
            z.object({
              transcript: z.string().default(''),
              confidence: z.number().default(0),
            }),
          ),
        }),
      )
      .min(1),
  }),
});

/** "ta-IN" → "ta"; anything outside the supported set becomes 'auto'. */
export function mapDeepgramLanguage(language: string | undefined): string {
  if (!language) return AUTO;
  const base = language.split('-')[0].toLowerCase();
  return isLanguageCode(base) ? base : AUTO;
}

export class DeepgramSpeechToText implements SpeechToText {
  constructor(
    private readonly apiKey: string,
    private readonly model = 'nova-2',
  ) {}

  async transcribe(audio: Buffer): Promise<{ text: string; language: string; confidence: number }> {
    const params = new URLSearchParams({ model: this.model, language: 'multi', detect_language: 'true' });
    const res = await fetch(`${BASE_URL}/listen?${params}`, {
      method: 'POST',
      headers: { Authorization: `Token ${this.apiKey}` },
      body: new Blob([audio], { type: 'audio/wav' }),
      signal: AbortSignal.timeout(2 * DEFAULT_TIMEOUT_MS),
    });
    await ensureOk('stt', res);

    const payload = await readJson('stt', res, listenResponseSchema);
    const channel = payload.results.channels[0];
    const best = channel.alternatives[0];
    if (!best) throw new CollaboratorError('stt', 'no alternatives in response');

    const transcript = best.transcript.trim();
    if (!transcript) {
      logger.warn('Deepgram returned an empty transcript');
      return { text: SILENCE_MARKER, language: AUTO, confidence: 0 };
    }

    return {
      text: transcript,
      language: mapDeepgramLanguage(channel.detected_language),
      confidence: best.confidence,
    };
  }
}
