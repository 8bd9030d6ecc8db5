import {
  ChatMessage,
  CompletionOptions,
  ProviderConfig,
  ProviderName,
} from '../types/news.types';

export const LLM_PROVIDERS = Symbol('LLM_PROVIDERS');

/**
 * One completion backend. `complete` makes a single attempt and rejects with a
 * `ProviderError` on timeout, non-2xx status or an unusable body.
 */
export interface LlmProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): Promise<string>;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 500;

export function authHeaders(config: ProviderConfig): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (config.apiKey) {
    headers.Authorization = `Bearer ${config.apiKey}`;
  }
  return headers;
}
