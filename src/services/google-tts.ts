import { z } from 'zod';
import type { LanguageCode } from '../config/languages';
import type { TextToSpeech } from '../types';
import { CollaboratorError } from '../utils/errors';
import { DEFAULT_TIMEOUT_MS, ensureOk, readJson } from '../utils/http';

const BASE_URL = 'https://texttospeech.googleapis.com/v1';

// Female voices; WaveNet where Google offers one for the language.
export const VOICE_MAP: Record<LanguageCode, string> = {
  hi: 'hi-IN-Wavenet-D',
  ta: 'ta-IN-Wavenet-A',
  te: 'te-IN-Standard-A',
  kn: 'kn-IN-Wavenet-A',
  ml: 'ml-IN-Wavenet-A',
  bn: 'bn-IN-Wavenet-A',
  gu: 'gu-IN-Wavenet-A',
  mr: 'mr-IN-Wavenet-A',
  pa: 'pa-IN-Wavenet-A',
  en: 'en-IN-Wavenet-D',
  or: 'or-IN-Standard-A',
};

const synthesizeResponseSchema = z.object({
  audioContent: z.string().optional(),
});

export function synthesizeRequest(text: string, language: LanguageCode) {
  return {
    input: { text },
    voice: { languageCode: `${language}-IN`, name: VOICE_MAP[language] },
    audioConfig: { audioEncoding: 'MP3', speakingRate: 1.0, pitch: 0.0, volumeGainDb: 0.0 },
  };
}

/** Google Cloud Text-to-Speech. Returns MP3 audio the carrier can play directly. */
export class GoogleTextToSpeech implements TextToSpeech {
  constructor(private readonly apiKey: string) {}

  async synthesize(text: string, language: LanguageCode): Promise<Buffer> {
    const res = await fetch(`${BASE_URL}/text:synthesize?key=${encodeURIComponent(this.apiKey)}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(synthesizeRequest(text, language)),
      signal: AbortSignal.timeout(DEFAULT_TIMEOUT_MS),
    });
    await ensureOk('tts', res);

    const data = await readJson('tts', res, synthesizeResponseSchema);
    if (!data.audioContent) throw new CollaboratorError('tts', 'no audio content in response');
    return Buffer.from(data.audioContent, 'base64');
  }
}
