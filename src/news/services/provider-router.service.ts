import { Inject, Injectable, Logger } from '@nestjs/common';
import { AllProvidersFailedError, errorMessage } from '../errors/news.errors';
import { LLM_PROVIDERS, LlmProvider } from '../providers/llm-provider';
import {
  ChatMessage,
  CompletionOptions,
  ProviderAttempt,
  ProviderName,
  RoutedCompletion,
} from '../types/news.types';
import { cleanText } from '../utils/text.util';

@Injectable()
export class ProviderRouterService {
  private readonly logger = new Logger(ProviderRouterService.name);
  private readonly unavailableLogged = new Set<string>();

  constructor(
    @Inject(LLM_PROVIDERS) private readonly providers: LlmProvider[],
  ) {}

  chain(): ProviderName[] {
    return this.providers.map((provider) => provider.name);
  }

  async invoke(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): Promise<string> {
    const { text } = await this.invokeDetailed(messages, options);
    return text;
  }

  /**
   * One attempt per provider in priority order; the first success wins and
   * later providers are never called.
   */
  async invokeDetailed(
    messages: ChatMessage[],
    options?: CompletionOptions,
  ): Promise<RoutedCompletion> {
    if (this.providers.length === 0) {
      this.logUnavailable('no enabled LLM provider');
      throw new AllProvidersFailedError([]);
    }

    const attempts: ProviderAttempt[] = [];
    for (const provider of this.providers) {
      const startedAt = Date.now();
      try {
        const text = await provider.complete(messages, options);
        this.logger.log(
          `llm call ok: provider=${provider.name} model=${provider.model} elapsedMs=${Date.now() - startedAt}`,
        );
        return { text, provider: provider.name, attempts };
      } catch (error) {
        const reason = errorMessage(error);
        attempts.push({ provider: provider.name, error: reason });
        this.logUnavailable(`${provider.name}_failed`, reason);
      }
    }

    throw new AllProvidersFailedError(attempts);
  }

  // same reason is only warned once per process to keep fallback noise down
  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      this.logger.debug(`AI unavailable: ${reason}`);
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '').slice(0, 180);
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }
}
