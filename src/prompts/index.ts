import { z } from 'zod';
import type { LanguageCode } from '../config/languages';
import spoken from './spoken.json';

const promptSetSchema = z.object({
  greeting: z.string().min(1),
  hold: z.string().min(1),
  stillProcessing: z.string().min(1),
  askNext: z.string().min(1),
  recordNext: z.string().min(1),
  areYouThere: z.string().min(1),
  goodbye: z.string().min(1),
  limitReached: z.string().min(1),
  error: z.string().min(1),
  repeat: z.string().min(1),
});

export type PromptSet = z.infer<typeof promptSetSchema>;
export type PromptKey = keyof PromptSet;

const promptTableSchema = z.object({
  hi: promptSetSchema,
  ta: promptSetSchema,
  te: promptSetSchema,
  kn: promptSetSchema,
  ml: promptSetSchema,
  bn: promptSetSchema,
  gu: promptSetSchema,
  pa: promptSetSchema,
  or: promptSetSchema,
  mr: promptSetSchema,
  en: promptSetSchema,
}) satisfies z.ZodType<Record<LanguageCode, PromptSet>>;

const prompts: Record<LanguageCode, PromptSet> = promptTableSchema.parse(spoken);

/** Caller-facing prompt text in the given language. */
export function prompt(language: LanguageCode, key: PromptKey): string {
  return prompts[language][key];
}

export { buildAnswerInstruction, HELPLINE_PERSONA } from './answer';
