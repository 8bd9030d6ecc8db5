import { Module } from '@nestjs/common';
import {
  loadPipelineConfig,
  PIPELINE_CONFIG,
  PipelineConfig,
} from './config/pipeline.config';
import { NewsController } from './news.controller';
import { LLM_PROVIDERS } from './providers/llm-provider';
import { createProviderChain } from './providers/provider.factory';
import { FeedFetcherService } from './services/feed-fetcher.service';
import { FeedResolverService } from './services/feed-resolver.service';
import { NewsDigestService } from './services/news-digest.service';
import { ProviderRouterService } from './services/provider-router.service';
import { RegionCatalogService } from './services/region-catalog.service';
import { SummaryPipelineService } from './services/summary-pipeline.service';
import { TopicExpanderService } from './services/topic-expander.service';

@Module({
  controllers: [NewsController],
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: (): PipelineConfig => loadPipelineConfig(),
    },
    {
      provide: LLM_PROVIDERS,
      useFactory: createProviderChain,
      inject: [PIPELINE_CONFIG],
    },
    RegionCatalogService,
    FeedResolverService,
    FeedFetcherService,
    ProviderRouterService,
    TopicExpanderService,
    SummaryPipelineService,
    NewsDigestService,
  ],
  exports: [NewsDigestService, RegionCatalogService],
})
export class NewsModule {}
