/**
 * AI Gateway: one prompt in, generated text out. Every call is bounded by a
 * timeout and every provider failure (missing key, auth, HTTP error, timeout,
 * empty completion) becomes UPSTREAM_UNAVAILABLE. Holds no retry or cache state.
 */
import { logger } from '../config/logger';
import { SessionError } from '../services/errors';
import type { ILLMService, LLMMessage } from './llm';

export interface GenerateOptions {
  /** System instruction sent ahead of the prompt */
  system?: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`AI provider timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function describeFailure(err: unknown): Record<string, unknown> {
  if (err instanceof TimeoutError) return { reason: 'timeout' };
  const status = typeof err === 'object' && err !== null && 'status' in err ? err.status : undefined;
  return { reason: 'provider_error', status, message: err instanceof Error ? err.message : String(err) };
}

export class AiGateway {
  constructor(
    private readonly llm: ILLMService | null,
    private readonly defaults: { timeoutMs: number }
  ) {}

  get configured(): boolean {
    return this.llm !== null;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (!this.llm) {
      throw new SessionError('UPSTREAM_UNAVAILABLE', 'AI provider is not configured');
    }
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const messages: LLMMessage[] = options.system
      ? [
          { role: 'system', content: options.system },
          { role: 'user', content: prompt },
        ]
      : [{ role: 'user', content: prompt }];

    let content: string;
    try {
      const response = await withTimeout(
        this.llm.chat(messages, {
          timeoutMs,
          temperature: options.temperature,
          maxTokens: options.maxTokens,
        }),
        timeoutMs
      );
      content = response.content.trim();
    } catch (err) {
      logger.warn('AI provider call failed', describeFailure(err));
      throw new SessionError('UPSTREAM_UNAVAILABLE', 'AI provider is unavailable, try again later', { cause: err });
    }

    if (!content) {
      logger.warn('AI provider returned an empty completion');
      throw new SessionError('UPSTREAM_UNAVAILABLE', 'AI provider returned an empty response');
    }
    return content;
  }
}
