import { DigestLanguage } from '../types/news.types';

export const SERVICE_NAME = 'bilingual-news-digest';
export const SERVICE_VERSION = '1.0.0';

export const GOOGLE_NEWS_SEARCH_URL = 'https://news.google.com/rss/search';
export const DEFAULT_TOPIC = 'trending';

export const USER_AGENT = 'bilingual-news-digest/1.0';
export const FEED_ACCEPT =
  'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8';

export const DEFAULT_MAX_NEWS_COUNT = 15;
export const DEFAULT_SUMMARY_HEADLINE_LIMIT = 10;
export const DEFAULT_RECENCY_WINDOW = 'when:1d';
export const DEFAULT_FEED_TIMEOUT_SEC = 12;
export const DEFAULT_LLM_TIMEOUT_SEC = 30;

export const DEFAULT_LOCAL_LLM_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_LOCAL_LLM_MODEL = 'llama3.1';
export const DEFAULT_OPENAI_API_BASE = 'https://api.openai.com/v1';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_GEMINI_API_BASE =
  'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

// values shipped in example env files that must not count as credentials
export const PLACEHOLDER_API_KEYS = new Set([
  'your-openai-api-key-here',
  'your-gemini-api-key-here',
  'changeme',
]);

export const EXPANSION_MAX_CHARS = 80;

type MessageKey =
  | 'fetchFailed'
  | 'summaryUnavailable'
  | 'summaryMalformed'
  | 'translationUnavailable';

export const MESSAGES: Record<DigestLanguage, Record<MessageKey, string>> = {
  en: {
    fetchFailed: 'Failed to fetch news, please try again later',
    summaryUnavailable: 'AI summary is unavailable',
    summaryMalformed: 'AI summary could not be read',
    translationUnavailable: 'Chinese summary is unavailable',
  },
  zh: {
    fetchFailed: '無法取得新聞，請稍後再試',
    summaryUnavailable: 'AI 摘要暫時無法使用',
    summaryMalformed: 'AI 摘要格式無法解析',
    translationUnavailable: '中文摘要暫時無法使用',
  },
};
