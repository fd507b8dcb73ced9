import {
  AUTO,
  DEFAULT_LANGUAGE,
  LanguageCode,
  isLanguageCode,
  scriptLanguages,
} from '../config/languages';
import { logger } from '../utils/logger';

/** A script must contribute more than this many characters to count. */
export const MIN_SCRIPT_CHARS = 5;

/**
 * Picks the language whose script block holds the most characters of `text`.
 * Each character counts toward the first block that contains it; ties go to
 * the earlier language in LANGUAGE_CODES.
 */
export function detectScriptLanguage(text: string): LanguageCode | null {
  if (!text) return null;

  const blocks = scriptLanguages();
  const counts = new Map<LanguageCode, number>();

  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) continue;
    const hit = blocks.find(({ script }) => codePoint >= script.start && codePoint <= script.end);
    if (hit) counts.set(hit.code, (counts.get(hit.code) ?? 0) + 1);
  }

  let best: LanguageCode | null = null;
  let bestCount = 0;
  for (const { code } of blocks) {
    const count = counts.get(code) ?? 0;
    if (count > bestCount) {
      best = code;
      bestCount = count;
    }
  }

  return bestCount > MIN_SCRIPT_CHARS ? best : null;
}

/**
 * Reconciles the provider-reported language, the script of the transcript and
 * the caller's phone-derived hint into one effective language.
 */
export function resolveLanguage(
  providerLanguage: string,
  transcribedText: string,
  phoneHint?: string | null,
): LanguageCode {
  const hint = isLanguageCode(phoneHint) ? phoneHint : null;

  if (providerLanguage !== AUTO) {
    if (isLanguageCode(providerLanguage)) return providerLanguage;
    logger.warn('Implausible provider language, falling back to phone hint', {
      providerLanguage,
      phoneHint: hint,
    });
    return hint ?? DEFAULT_LANGUAGE;
  }

  const scriptLanguage = detectScriptLanguage(transcribedText);
  if (scriptLanguage) {
    logger.debug('Language resolved from script', { language: scriptLanguage });
    return scriptLanguage;
  }

  if (hint) return hint;

  logger.debug('Language unresolved, using default', { language: DEFAULT_LANGUAGE });
  return DEFAULT_LANGUAGE;
}
