import { ProviderError } from '../errors/news.errors';
import {
  ChatMessage,
  CompletionOptions,
  ProviderConfig,
  ProviderName,
} from '../types/news.types';
import { asRecord, safeFetch } from '../utils/http.util';
import {
  authHeaders,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  LlmProvider,
} from './llm-provider';

/** `/chat/completions` servers: OpenAI itself and local runtimes (Ollama, LM Studio, vLLM). */
export class OpenAiCompatibleProvider implements LlmProvider {
  readonly name: ProviderName;
  readonly model: string;

  constructor(private readonly config: ProviderConfig) {
    this.name = config.name;
    this.model = config.model;
  }

  async complete(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): Promise<string> {
    const response = await safeFetch(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: authHeaders(this.config),
      body: JSON.stringify({
        model: this.config.model,
        messages,
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      }),
      timeoutMs: this.config.timeoutMs,
    });

    if (!response.ok) {
      throw new ProviderError(
        this.name,
        response.status === 0
          ? response.raw
          : `${response.status} ${response.raw.slice(0, 180)}`,
      );
    }

    const choices = Array.isArray(response.json?.choices)
      ? (response.json?.choices as unknown[])
      : [];
    const message = asRecord(asRecord(choices[0])?.message);
    const content =
      typeof message?.content === 'string' ? message.content.trim() : '';
    if (!content) {
      throw new ProviderError(this.name, 'malformed response: no message content');
    }
    return content;
  }
}
