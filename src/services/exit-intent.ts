import { z } from 'zod';
import { COMMON_LANGUAGE, LanguageCode } from '../config/languages';
import keywordData from '../config/exit-keywords.json';

/** Keypress that ends the call regardless of what was said. */
export const EXIT_DIGIT = '#';

const keywordTableSchema = z.record(z.string(), z.array(z.string().min(1)));

const KEYWORDS: Record<string, string[]> = keywordTableSchema.parse(keywordData);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords match whole words: no letter, mark or digit directly on either side.
function keywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{M}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{M}\\p{N}])`, 'iu');
}

const patternCache = new Map<string, RegExp[]>();

function patternsFor(language: string): RegExp[] {
  let patterns = patternCache.get(language);
  if (!patterns) {
    patterns = (KEYWORDS[language] ?? []).map(keywordPattern);
    patternCache.set(language, patterns);
  }
  return patterns;
}

export function exitKeywords(language: LanguageCode): string[] {
  return KEYWORDS[language] ?? [];
}

/**
 * True when the caller asked to end the call. Checks the exit digit, then exit
 * phrases in the call's language, then English exit phrases in any language.
 */
export function isExitIntent(input: { speech?: string; digits?: string }, language: LanguageCode): boolean {
  if (input.digits?.includes(EXIT_DIGIT)) return true;

  const speech = input.speech?.trim();
  if (!speech) return false;

  const text = speech.normalize('NFC');
  if (patternsFor(language).some((re) => re.test(text))) return true;
  return language !== COMMON_LANGUAGE && patternsFor(COMMON_LANGUAGE).some((re) => re.test(text));
}
