import { AUTO } from '../config/languages';
import type { TranscriptionResult } from '../types';

export function fromProvider(result: { text: string; language: string; confidence: number }): TranscriptionResult {
  return { source: 'provider', text: result.text, language: result.language || AUTO, confidence: result.confidence };
}

/**
 * Speech the carrier already recognised. The recognizer ran in `language`, so
 * that is what the resolver sees; without one it is left to script detection.
 */
export function fromExternalText(text: string, language: string = AUTO): TranscriptionResult {
  return { source: 'external', text: text.trim(), language };
}
