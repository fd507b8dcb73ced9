import { z } from 'zod';
import type { Translator } from '../types';
import { DEFAULT_TIMEOUT_MS, ensureOk, readJson } from '../utils/http';

const BASE_URL = 'https://api.sarvam.ai';

const translateResponseSchema = z.object({
  translated_text: z.string(),
  request_id: z.string().nullish(),
});

/** Sarvam translation between BCP-47 style tags such as "hi-IN" and "en-IN". */
export class SarvamTranslator implements Translator {
  constructor(private readonly apiKey: string) {}

  async translate(text: string, sourceTag: string, targetTag: string): Promise<{ translatedText: string }> {
    const res = await fetch(`${BASE_URL}/translate`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-subscription-key': this.apiKey,
      },
      body: JSON.stringify({
        input: text,
        source_language_code: sourceTag,
        target_language_code: targetTag,
      }),
      signal: AbortSignal.timeout(DEFAULT_TIMEOUT_MS),
    });
    await ensureOk('translate', res);

    const data = await readJson('translate', res, translateResponseSchema);
    return { translatedText: data.translated_text };
  }
}
