import { Inject, Injectable, Logger } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { errorMessage, SummarizationError } from '../errors/news.errors';
import {
  buildSummaryMessages,
  buildTranslationMessages,
  EN_HEADERS,
  ZH_HEADERS,
} from '../prompts/summary.prompt';
import { NewsItem, SummaryOutcome, SummarySection } from '../types/news.types';
import { extractSections } from '../utils/section.util';
import { cleanText } from '../utils/text.util';
import { ProviderRouterService } from './provider-router.service';

@Injectable()
export class SummaryPipelineService {
  private readonly logger = new Logger(SummaryPipelineService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly router: ProviderRouterService,
  ) {}

  /**
   * English summary first, then a separate translation pass. Rejects with
   * `AllProvidersFailedError` or `SummarizationError` only when the English
   * half fails; a failed translation yields `zh: null`.
   */
  async summarize(items: NewsItem[]): Promise<SummaryOutcome> {
    const startedAt = Date.now();
    const headlines = items
      .slice(0, this.config.summaryHeadlineLimit)
      .map((item) => cleanText(item.title))
      .filter(Boolean);
    if (headlines.length === 0) {
      throw new SummarizationError('no headlines to summarize');
    }
    this.logger.log(`summary start: headlines=${headlines.length}`);

    const englishRaw = await this.router.invoke(buildSummaryMessages(headlines), {
      temperature: 0.7,
      maxTokens: 500,
    });
    const en = extractSections(englishRaw, EN_HEADERS);

    let zh: SummarySection | null = null;
    let translationError: string | null = null;
    try {
      zh = await this.translate(en);
    } catch (error) {
      translationError = errorMessage(error);
      this.logger.warn(`translation failed, keeping English only: ${translationError}`);
    }

    this.logger.log(
      `summary done: zh=${zh ? 1 : 0} elapsedMs=${Date.now() - startedAt}`,
    );
    return { en, zh, translationError };
  }

  private async translate(section: SummarySection): Promise<SummarySection> {
    const raw = await this.router.invoke(buildTranslationMessages(section), {
      temperature: 0.2,
      maxTokens: 600,
    });
    return extractSections(raw, ZH_HEADERS);
  }
}
