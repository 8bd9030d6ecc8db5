import {
  BilingualSummary,
  DigestResult,
  NewsItem,
  NewsResponse,
  SummarySection,
  TakeawayResponse,
} from '../types/news.types';
import { formatPublished } from './date.util';

export function assembleDigest(
  items: NewsItem[],
  sourceUrl: string,
  summary: BilingualSummary | null,
  summaryError: string | null,
): DigestResult {
  return {
    items: [...items],
    sourceUrl,
    summary: summary ? { en: summary.en, zh: summary.zh } : null,
    summaryError,
  };
}

export function toNewsResponse(result: DigestResult): NewsResponse {
  return {
    items: result.items.map((item) => ({
      title: item.title,
      link: item.link,
      summary: item.summary,
      published: formatPublished(item.publishedAt),
      source: item.sourceDomain,
    })),
    source: result.sourceUrl,
    takeaway: result.summary
      ? {
          en: toTakeaway(result.summary.en),
          zh: result.summary.zh ? toTakeaway(result.summary.zh) : null,
        }
      : null,
    ai_error: result.summaryError,
  };
}

function toTakeaway(section: SummarySection): TakeawayResponse {
  return {
    things_to_watch: section.watchPoints,
    takeaway: section.takeaway,
  };
}
