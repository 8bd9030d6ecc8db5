import { PipelineConfig, resolveProviderChain } from '../config/pipeline.config';
import { ProviderConfig } from '../types/news.types';
import { GeminiProvider } from './gemini.provider';
import { LlmProvider } from './llm-provider';
import { OpenAiCompatibleProvider } from './openai-compatible.provider';

export function createLlmProvider(config: ProviderConfig): LlmProvider {
  switch (config.protocol) {
    case 'openai':
      return new OpenAiCompatibleProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

export function createProviderChain(config: PipelineConfig): LlmProvider[] {
  return resolveProviderChain(config).map(createLlmProvider);
}
