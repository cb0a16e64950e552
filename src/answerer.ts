import OpenAI from 'openai';
import { ApiError, describeError } from './errors.js';

export const NO_RESPONSE_MESSAGE = 'No response generated.';
export const NO_CONTEXT_MESSAGE = 'No content extracted from the PDF.';

export interface LanguageModel {
  readonly model: string;
  /** Returns the response text, or null when the provider sent none. */
  generate(prompt: string): Promise<string | null>;
}

export type OpenAIModelOptions = {
  apiKey?: string;
  model: string;
  baseURL?: string;
  timeoutMs?: number;
};

export class OpenAIModel implements LanguageModel {
  readonly model: string;
  private client?: OpenAI;

  constructor(private opts: OpenAIModelOptions) {
    this.model = opts.model;
  }

  async generate(prompt: string): Promise<string | null> {
    try {
      const response = await this.getClient().chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }]
      });
      return response.choices[0]?.message?.content ?? null;
    } catch (err) {
      throw new ApiError(describeError(err), { cause: err });
    }
  }

  // The SDK throws at construction when no key is configured
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.opts.apiKey,
        baseURL: this.opts.baseURL,
        timeout: this.opts.timeoutMs ?? 60000,
        maxRetries: 0
      });
    }
    return this.client;
  }
}

export function buildPrompt(context: string, question: string): string {
  return `Context: ${context}\n\nQuestion: ${question}`;
}

/**
 * One request per question, the whole context in the prompt. Oversized context
 * is left for the provider to reject. Failures come back as answer text.
 */
export class QuestionAnswerer {
  constructor(private llm: LanguageModel) {}

  async answer(context: string, question: string): Promise<string> {
    if (!context) return NO_CONTEXT_MESSAGE;
    try {
      const text = await this.llm.generate(buildPrompt(context, question));
      return text && text.trim() ? text : NO_RESPONSE_MESSAGE;
    } catch (err) {
      return `Error: ${describeError(err)}`;
    }
  }
}
