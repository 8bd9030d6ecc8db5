import { Inject, Injectable } from '@nestjs/common';
import { GOOGLE_NEWS_SEARCH_URL } from '../config/news.constants';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { FeedSource, Region } from '../types/news.types';
import { cleanText } from '../utils/text.util';

@Injectable()
export class FeedResolverService {
  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  build(
    topic: string,
    region: Region,
    customUrl: string | null,
    expandedKeywords?: string | null,
  ): FeedSource {
    if (customUrl) {
      // only intent here; FeedFetcher reclassifies a non-feed body as a page
      return { url: customUrl, allowPageFallback: true };
    }

    const url = new URL(GOOGLE_NEWS_SEARCH_URL);
    url.searchParams.set(
      'q',
      `${this.topicQuery(topic, expandedKeywords)} ${this.config.recencyWindow}`,
    );
    url.searchParams.set('hl', region.localeLanguage);
    url.searchParams.set('gl', region.countryCode);
    url.searchParams.set('ceid', region.feedRegionId);
    return { url: url.toString(), allowPageFallback: false };
  }

  topicQuery(topic: string, expandedKeywords?: string | null): string {
    const original = cleanText(topic);
    const expanded = cleanText(expandedKeywords ?? '');
    if (!expanded || expanded.toLowerCase() === original.toLowerCase()) {
      return original;
    }
    return `${group(original)} OR ${group(expanded)}`;
  }
}

// OR binds single terms only; multi-word forms need their own group
function group(query: string): string {
  return /\s/.test(query) ? `(${query})` : query;
}
