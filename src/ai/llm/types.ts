/**
 * LLM abstraction: provider-agnostic interface so the gateway can talk to
 * OpenAI, OpenRouter or any OpenAI-compatible endpoint without changing callers.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  /** Per-request timeout in ms; the provider rejects after this. */
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLMService {
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}
