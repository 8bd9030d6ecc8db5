import { Injectable, Logger } from '@nestjs/common';
import { MESSAGES } from '../config/news.constants';
import {
  AllProvidersFailedError,
  errorMessage,
  SummarizationError,
} from '../errors/news.errors';
import { PROVIDER_CHECK_MESSAGES } from '../prompts/summary.prompt';
import {
  BilingualSummary,
  DigestLanguage,
  DigestRequest,
  DigestResult,
  NewsItem,
  RoutedCompletion,
} from '../types/news.types';
import { assembleDigest } from '../utils/response.util';
import { FeedFetcherService } from './feed-fetcher.service';
import { FeedResolverService } from './feed-resolver.service';
import { ProviderRouterService } from './provider-router.service';
import { RegionCatalogService } from './region-catalog.service';
import { SummaryPipelineService } from './summary-pipeline.service';
import { TopicExpanderService } from './topic-expander.service';

@Injectable()
export class NewsDigestService {
  private readonly logger = new Logger(NewsDigestService.name);

  constructor(
    private readonly regionCatalog: RegionCatalogService,
    private readonly feedResolver: FeedResolverService,
    private readonly feedFetcher: FeedFetcherService,
    private readonly topicExpander: TopicExpanderService,
    private readonly summaryPipeline: SummaryPipelineService,
    private readonly router: ProviderRouterService,
  ) {}

  /** Rejects only with `FetchError`; summary problems land in `summaryError`. */
  async getDigest(request: DigestRequest): Promise<DigestResult> {
    const startedAt = Date.now();
    const region = this.regionCatalog.resolve(request.region);
    this.logger.log(
      `digest start: topic="${request.topic}" region=${region.code} custom=${request.customUrl ? 1 : 0}`,
    );

    const expanded = request.customUrl
      ? null
      : await this.topicExpander.maybeExpand(request.topic);
    const source = this.feedResolver.build(
      request.topic,
      region,
      request.customUrl,
      expanded,
    );
    const items = await this.feedFetcher.fetch(source);

    if (items.length === 0) {
      this.logger.log(`digest done: no items elapsedMs=${Date.now() - startedAt}`);
      return assembleDigest(items, source.url, null, null);
    }

    const { summary, error } = await this.summarizeSafely(items, request.lang);
    this.logger.log(
      `digest done: items=${items.length} summary=${summary ? 1 : 0} elapsedMs=${Date.now() - startedAt}`,
    );
    return assembleDigest(items, source.url, summary, error);
  }

  async checkProviders(): Promise<RoutedCompletion> {
    return this.router.invokeDetailed(PROVIDER_CHECK_MESSAGES, {
      maxTokens: 5,
      temperature: 0,
    });
  }

  private async summarizeSafely(
    items: NewsItem[],
    lang: DigestLanguage,
  ): Promise<{ summary: BilingualSummary | null; error: string | null }> {
    const messages = MESSAGES[lang];
    try {
      const outcome = await this.summaryPipeline.summarize(items);
      const error = outcome.translationError
        ? `${messages.translationUnavailable}: ${outcome.translationError}`
        : null;
      return { summary: { en: outcome.en, zh: outcome.zh }, error };
    } catch (error) {
      if (error instanceof AllProvidersFailedError) {
        return {
          summary: null,
          error: `${messages.summaryUnavailable}: ${error.message}`,
        };
      }
      if (error instanceof SummarizationError) {
        return {
          summary: null,
          error: `${messages.summaryMalformed}: ${error.message}`,
        };
      }
      this.logger.error(`unexpected summary failure: ${errorMessage(error)}`);
      return { summary: null, error: messages.summaryUnavailable };
    }
  }
}
