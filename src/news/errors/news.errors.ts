import { ProviderAttempt, ProviderName } from '../types/news.types';

export class FetchError extends Error {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class ProviderError extends Error {
  constructor(
    readonly provider: ProviderName,
    message: string,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class AllProvidersFailedError extends Error {
  constructor(readonly attempts: ProviderAttempt[]) {
    super(
      attempts.length === 0
        ? 'no enabled LLM provider'
        : `all LLM providers failed: ${attempts
            .map((attempt) => `${attempt.provider} (${attempt.error})`)
            .join('; ')}`,
    );
    this.name = 'AllProvidersFailedError';
  }
}

export class SummarizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SummarizationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
