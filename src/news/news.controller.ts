import {
  BadGatewayException,
  BadRequestException,
  Controller,
  Get,
  Inject,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { DEFAULT_TOPIC, MESSAGES } from './config/news.constants';
import { PIPELINE_CONFIG, PipelineConfig } from './config/pipeline.config';
import { AllProvidersFailedError, FetchError } from './errors/news.errors';
import { NewsDigestService } from './services/news-digest.service';
import { RegionCatalogService } from './services/region-catalog.service';
import { DigestLanguage, LlmMode, NewsResponse } from './types/news.types';
import { toNewsResponse } from './utils/response.util';

@Controller('api')
export class NewsController {
  constructor(
    private readonly newsDigestService: NewsDigestService,
    private readonly regionCatalog: RegionCatalogService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  @Get('health')
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  @Get('regions')
  getRegions(): { regions: { code: string; name: string }[] } {
    return {
      regions: this.regionCatalog
        .list()
        .map((region) => ({ code: region.code, name: region.name })),
    };
  }

  @Get('news')
  async getNews(
    @Query('topic') topicRaw?: string,
    @Query('region') regionRaw?: string,
    @Query('customUrl') customUrlRaw?: string,
    @Query('lang') langRaw?: string,
  ): Promise<NewsResponse> {
    const lang = this.parseLang(langRaw);
    const customUrl = this.parseCustomUrl(customUrlRaw);

    try {
      const result = await this.newsDigestService.getDigest({
        topic: this.asText(topicRaw) || DEFAULT_TOPIC,
        region: this.asText(regionRaw),
        customUrl,
        lang,
      });
      return toNewsResponse(result);
    } catch (error) {
      if (error instanceof FetchError) {
        throw new BadGatewayException({
          items: [],
          error: MESSAGES[lang].fetchFailed,
        });
      }
      throw error;
    }
  }

  @Get('providers')
  getProviders(): {
    mode: LlmMode;
    providers: { name: string; model: string; enabled: boolean }[];
  } {
    return {
      mode: this.config.llmMode,
      providers: this.config.providers.map((provider) => ({
        name: provider.name,
        model: provider.model,
        enabled: provider.enabled,
      })),
    };
  }

  @Get('providers/test')
  async testProviders(): Promise<{
    status: 'success';
    provider: string;
    response: string;
  }> {
    try {
      const result = await this.newsDigestService.checkProviders();
      return {
        status: 'success',
        provider: result.provider,
        response: result.text,
      };
    } catch (error) {
      if (error instanceof AllProvidersFailedError) {
        throw new ServiceUnavailableException({
          status: 'error',
          message: error.message,
          attempts: error.attempts,
        });
      }
      throw error;
    }
  }

  private parseLang(value: unknown): DigestLanguage {
    const lowered = this.asText(value).toLowerCase();
    return lowered.startsWith('zh') ? 'zh' : 'en';
  }

  private parseCustomUrl(value: unknown): string | null {
    const raw = this.asText(value);
    if (!raw) {
      return null;
    }
    const parsed = this.tryParseUrl(raw);
    if (!parsed || !['http:', 'https:'].includes(parsed.protocol)) {
      throw new BadRequestException('customUrl must be an http(s) URL');
    }
    return parsed.toString();
  }

  private tryParseUrl(value: string): URL | null {
    try {
      return new URL(value);
    } catch {
      return null;
    }
  }

  // repeated query keys arrive as arrays; the first value wins
  private asText(value: unknown): string {
    const first: unknown = Array.isArray(value) ? value[0] : value;
    return typeof first === 'string' ? first.trim() : '';
  }
}
