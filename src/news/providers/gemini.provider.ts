import { ProviderError } from '../errors/news.errors';
import {
  ChatMessage,
  CompletionOptions,
  ProviderConfig,
  ProviderName,
} from '../types/news.types';
import { asRecord, safeFetch } from '../utils/http.util';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  LlmProvider,
} from './llm-provider';

export class GeminiProvider implements LlmProvider {
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
    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const contents = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    const payload: Record<string, unknown> = {
      contents,
      generationConfig: {
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        maxOutputTokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
    };
    if (system) {
      payload.systemInstruction = { parts: [{ text: system }] };
    }

    const url = `${this.config.baseUrl}/models/${this.config.model}:generateContent`;
    const response = await safeFetch(url, {
      method: 'POST',
      headers: {
        'x-goog-api-key': this.config.apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
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

    const text = this.extractText(response.json);
    if (!text) {
      throw new ProviderError(this.name, 'malformed response: no candidate text');
    }
    return text;
  }

  private extractText(json: Record<string, unknown> | null): string {
    const candidates = Array.isArray(json?.candidates) ? json.candidates : [];
    const content = asRecord(asRecord(candidates[0])?.content);
    const parts: unknown[] = Array.isArray(content?.parts) ? content.parts : [];
    return parts
      .map((part) => asRecord(part)?.text)
      .filter((text): text is string => typeof text === 'string')
      .join('')
      .trim();
  }
}
