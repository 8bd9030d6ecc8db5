import {
  DEFAULT_FEED_TIMEOUT_SEC,
  DEFAULT_GEMINI_API_BASE,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_LLM_TIMEOUT_SEC,
  DEFAULT_LOCAL_LLM_BASE_URL,
  DEFAULT_LOCAL_LLM_MODEL,
  DEFAULT_MAX_NEWS_COUNT,
  DEFAULT_OPENAI_API_BASE,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_RECENCY_WINDOW,
  DEFAULT_SUMMARY_HEADLINE_LIMIT,
  PLACEHOLDER_API_KEYS,
} from './news.constants';
import { DEFAULT_REGION_CODE, REGIONS } from './regions';
import {
  LlmMode,
  ProviderConfig,
  ProviderName,
  Region,
} from '../types/news.types';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

export interface PipelineConfig {
  readonly regions: readonly Region[];
  readonly defaultRegionCode: string;
  readonly maxNewsCount: number;
  readonly summaryHeadlineLimit: number;
  readonly recencyWindow: string;
  readonly feedTimeoutMs: number;
  readonly llmMode: LlmMode;
  /** Ordered by fallback priority. */
  readonly providers: readonly ProviderConfig[];
}

type Env = Record<string, string | undefined>;

const MODE_ALIASES: Record<string, LlmMode> = {
  auto: 'auto',
  local: 'local',
  ollama: 'local',
  openai: 'cloudPrimary',
  cloudprimary: 'cloudPrimary',
  gemini: 'cloudSecondary',
  cloudsecondary: 'cloudSecondary',
};

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const llmTimeoutMs =
    positiveNumber(env.LLM_TIMEOUT_SEC, DEFAULT_LLM_TIMEOUT_SEC) * 1000;

  const providers: ProviderConfig[] = [
    {
      name: 'local',
      protocol: 'openai',
      baseUrl: trimSlash(env.LOCAL_LLM_BASE_URL || DEFAULT_LOCAL_LLM_BASE_URL),
      apiKey: credential(env.LOCAL_LLM_API_KEY),
      model: env.LOCAL_LLM_MODEL || DEFAULT_LOCAL_LLM_MODEL,
      // no credential to check; assumed reachable unless switched off
      enabled: !isOff(env.LOCAL_LLM_ENABLED),
      timeoutMs: llmTimeoutMs,
    },
    {
      name: 'cloudPrimary',
      protocol: 'openai',
      baseUrl: trimSlash(env.OPENAI_API_BASE || DEFAULT_OPENAI_API_BASE),
      apiKey: credential(env.OPENAI_API_KEY),
      model: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
      enabled: credential(env.OPENAI_API_KEY) !== '',
      timeoutMs: llmTimeoutMs,
    },
    {
      name: 'cloudSecondary',
      protocol: 'gemini',
      baseUrl: trimSlash(env.GEMINI_API_BASE || DEFAULT_GEMINI_API_BASE),
      apiKey: credential(env.GEMINI_API_KEY),
      model: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
      enabled: credential(env.GEMINI_API_KEY) !== '',
      timeoutMs: llmTimeoutMs,
    },
  ];

  return Object.freeze({
    regions: Object.freeze(
      REGIONS.map((region) => Object.freeze({ ...region })),
    ),
    defaultRegionCode: DEFAULT_REGION_CODE,
    maxNewsCount: Math.floor(
      positiveNumber(env.NEWS_MAX_ITEMS, DEFAULT_MAX_NEWS_COUNT),
    ),
    summaryHeadlineLimit: Math.floor(
      positiveNumber(env.SUMMARY_HEADLINE_LIMIT, DEFAULT_SUMMARY_HEADLINE_LIMIT),
    ),
    recencyWindow: normalizeRecencyWindow(env.FEED_RECENCY_WINDOW),
    feedTimeoutMs:
      positiveNumber(env.FEED_FETCH_TIMEOUT_SEC, DEFAULT_FEED_TIMEOUT_SEC) * 1000,
    llmMode: parseLlmMode(env.LLM_PROVIDER),
    providers: Object.freeze(
      providers.map((provider) => Object.freeze(provider)),
    ),
  });
}

/**
 * Providers the router may try, in order. `auto` walks every enabled provider
 * local-first; a pinned mode yields at most that one provider.
 */
export function resolveProviderChain(config: PipelineConfig): ProviderConfig[] {
  if (config.llmMode === 'auto') {
    return config.providers.filter((provider) => provider.enabled);
  }
  const pinned: ProviderName = config.llmMode;
  return config.providers.filter(
    (provider) => provider.name === pinned && provider.enabled,
  );
}

export function parseLlmMode(raw: string | undefined): LlmMode {
  const key = (raw ?? '').trim().toLowerCase();
  return MODE_ALIASES[key] ?? 'auto';
}

function normalizeRecencyWindow(raw: string | undefined): string {
  const value = (raw ?? '').trim();
  if (!value) {
    return DEFAULT_RECENCY_WINDOW;
  }
  return value.startsWith('when:') ? value : `when:${value}`;
}

function credential(raw: string | undefined): string {
  const value = (raw ?? '').trim();
  if (!value || PLACEHOLDER_API_KEYS.has(value)) {
    return '';
  }
  return value;
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function isOff(raw: string | undefined): boolean {
  const value = (raw ?? '').trim().toLowerCase();
  return ['0', 'false', 'no', 'off'].includes(value);
}

function trimSlash(url: string): string {
  return url.trim().replace(/\/+$/, '');
}
