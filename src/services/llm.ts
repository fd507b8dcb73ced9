import OpenAI from 'openai';
import type { AnswerGenerator } from '../types';
import { CollaboratorError } from '../utils/errors';

export interface ChatAnswerOptions {
  apiKey: string;
  /** OpenAI-compatible endpoint; Groq by default. */
  baseURL?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/** Answer generation over any OpenAI-compatible chat completions API. */
export class ChatAnswerGenerator implements AnswerGenerator {
  private readonly client: OpenAI;

  constructor(private readonly options: ChatAnswerOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, timeout: 60_000, maxRetries: 1 });
  }

  async generate(systemInstruction: string, userQuery: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: 'system', content: systemInstruction },
        { role: 'user', content: userQuery },
      ],
      temperature: this.options.temperature ?? 0.3,
      max_tokens: this.options.maxTokens ?? 512,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) throw new CollaboratorError('llm', `empty response from ${this.options.model}`);
    return content.trim();
  }
}
