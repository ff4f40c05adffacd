import OpenAI from 'openai';
import type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';

export interface OpenAILLMServiceOptions {
  apiKey: string;
  /** OpenAI-compatible base URL, e.g. https://openrouter.ai/api/v1 */
  baseUrl?: string;
  model: string;
  defaultTemperature: number;
  defaultMaxTokens: number;
}

/**
 * Chat completions over any OpenAI-compatible API (OpenAI, OpenRouter, ...).
 * SDK retries are off; the caller decides whether to try again.
 */
export class OpenAILLMService implements ILLMService {
  private client: OpenAI;

  constructor(private readonly options: OpenAILLMServiceOptions, client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl || undefined,
        maxRetries: 0,
      });
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: options?.temperature ?? this.options.defaultTemperature,
        max_tokens: options?.maxTokens ?? this.options.defaultMaxTokens,
      },
      { timeout: options?.timeoutMs, maxRetries: 0 }
    );

    return {
      content: completion.choices[0]?.message?.content ?? '',
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
      },
    };
  }
}
