import { z } from 'zod';
import { DEFAULT_LANGUAGE, LanguageCode, isLanguageCode } from '../config/languages';
import prefixData from '../config/phone-prefixes.json';

/**
 * Normalize a phone number to E.164 format.
 * Handles common Indian formats: 098765 43210, 98765-43210, 0091 98765 43210, +91 98765 43210.
 */
export function toE164(phone: string): string {
  const digits = phone.replace(/\D/g, '');

  if (phone.trim().startsWith('+')) {
    return `+${digits}`;
  }
  if (digits.startsWith('00')) {
    return `+${digits.slice(2)}`;
  }
  if (digits.length === 10) {
    return `+91${digits}`;
  }
  if (digits.length === 11 && digits.startsWith('0')) {
    return `+91${digits.slice(1)}`;
  }
  if (digits.length === 12 && digits.startsWith('91')) {
    return `+${digits}`;
  }

  throw new Error(`Cannot normalize phone number: ${phone}`);
}

/**
 * Basic validation that a string looks like a phone number.
 */
export function isValidPhone(phone: string): boolean {
  const digits = phone.replace(/\D/g, '');
  return digits.length >= 10 && digits.length <= 15;
}

const prefixTableSchema = z.object({
  default: z.string().refine(isLanguageCode, 'unknown language code'),
  prefixes: z.record(z.string().regex(/^\+\d+$/), z.string().refine(isLanguageCode, 'unknown language code')),
});

const prefixTable = prefixTableSchema.parse(prefixData);

// Longest prefix first so "+91172" wins over a shorter "+911...".
const PREFIXES: Array<[string, LanguageCode]> = Object.entries(prefixTable.prefixes)
  .flatMap(([prefix, lang]): Array<[string, LanguageCode]> => (isLanguageCode(lang) ? [[prefix, lang]] : []))
  .sort((a, b) => b[0].length - a[0].length);

const FALLBACK: LanguageCode = isLanguageCode(prefixTable.default) ? prefixTable.default : DEFAULT_LANGUAGE;

/**
 * Language hint for a caller, from the dialling prefix of their number.
 * Unknown or unparseable numbers get the default language.
 */
export function languageHintForPhone(phone: string | null | undefined): LanguageCode {
  if (!phone || !isValidPhone(phone)) return FALLBACK;

  let e164: string;
  try {
    e164 = toE164(phone);
  } catch {
    return FALLBACK;
  }

  const match = PREFIXES.find(([prefix]) => e164.startsWith(prefix));
  return match ? match[1] : FALLBACK;
}
