export type DigestLanguage = 'en' | 'zh';

export interface Region {
  code: string;
  name: string;
  localeLanguage: string;
  countryCode: string;
  feedRegionId: string;
}

export interface NewsItem {
  title: string;
  link: string;
  summary: string;
  publishedAt: string | null;
  sourceDomain: string;
}

export interface FeedSource {
  url: string;
  // custom URLs may turn out to be an article page rather than a feed
  allowPageFallback: boolean;
}

export type ProviderName = 'local' | 'cloudPrimary' | 'cloudSecondary';

export type ProviderProtocol = 'openai' | 'gemini';

export type LlmMode = 'auto' | ProviderName;

export interface ProviderConfig {
  name: ProviderName;
  protocol: ProviderProtocol;
  baseUrl: string;
  apiKey: string;
  model: string;
  enabled: boolean;
  timeoutMs: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ProviderAttempt {
  provider: ProviderName;
  error: string;
}

export interface RoutedCompletion {
  text: string;
  provider: ProviderName;
  attempts: ProviderAttempt[];
}

export interface SummarySection {
  watchPoints: string;
  takeaway: string;
}

export interface BilingualSummary {
  en: SummarySection;
  zh: SummarySection | null;
}

export interface SummaryOutcome extends BilingualSummary {
  translationError: string | null;
}

export interface DigestResult {
  items: NewsItem[];
  sourceUrl: string;
  summary: BilingualSummary | null;
  summaryError: string | null;
}

export interface DigestRequest {
  topic: string;
  region: string;
  customUrl: string | null;
  lang: DigestLanguage;
}

export interface NewsItemResponse {
  title: string;
  link: string;
  summary: string;
  published: string | null;
  source: string;
}

export interface TakeawayResponse {
  things_to_watch: string;
  takeaway: string;
}

export interface NewsResponse {
  items: NewsItemResponse[];
  source: string;
  takeaway: {
    en: TakeawayResponse;
    zh: TakeawayResponse | null;
  } | null;
  ai_error: string | null;
}
