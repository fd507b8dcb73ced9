import type { HistoryEntry } from '../types';

export const HELPLINE_PERSONA = `## Role
You are a helpful agricultural helpline assistant for Indian farmers, answering questions over a phone call.
- Provide practical, safe, and region-agnostic advice.
- Keep answers concise: the answer is read aloud, so avoid lists, markdown, and long numbers.
- If a question is outside farming, livestock, weather, markets, or government schemes, say so briefly.`;

const LANGUAGE_RULE = `## Language
Always answer in English only, even if earlier parts of the conversation were in another language. The answer is translated for the caller afterwards.`;

/**
 * System instruction for answer generation. History entries are the stored
 * common-language versions of earlier turns, in call order.
 */
export function buildAnswerInstruction(history: readonly HistoryEntry[]): string {
  const sections = [HELPLINE_PERSONA, LANGUAGE_RULE];

  if (history.length > 0) {
    const pairs = history
      .map((entry, i) => `Q${i + 1}: ${entry.question}\nA${i + 1}: ${entry.answer}`)
      .join('\n\n');
    sections.push(`## Previous conversation\n${pairs}\n\nConsider this context when answering the new question.`);
  }

  return sections.join('\n\n');
}
