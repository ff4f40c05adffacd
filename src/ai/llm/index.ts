/**
 * Single LLM provider export. Returns null when no AI_API_KEY is configured;
 * the gateway then reports the provider as unavailable instead of faking replies.
 */
import type { ILLMService } from './types';
import type { AppConfig } from '../../config';
import { OpenAILLMService } from './OpenAILLMService';

export function createLLMService(ai: AppConfig['ai']): ILLMService | null {
  if (!ai.apiKey) return null;
  return new OpenAILLMService({
    apiKey: ai.apiKey,
    baseUrl: ai.baseUrl,
    model: ai.model,
    defaultTemperature: ai.temperature,
    defaultMaxTokens: ai.maxTokens,
  });
}

export { OpenAILLMService } from './OpenAILLMService';
export type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
