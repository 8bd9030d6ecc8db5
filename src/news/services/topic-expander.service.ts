import { Injectable, Logger } from '@nestjs/common';
import { EXPANSION_MAX_CHARS } from '../config/news.constants';
import { errorMessage } from '../errors/news.errors';
import { buildExpansionMessages } from '../prompts/summary.prompt';
import { cleanText, hasNonLatinScript, truncate } from '../utils/text.util';
import { ProviderRouterService } from './provider-router.service';

@Injectable()
export class TopicExpanderService {
  private readonly logger = new Logger(TopicExpanderService.name);

  constructor(private readonly router: ProviderRouterService) {}

  /**
   * English keywords for a topic written in a non-Latin script, or null.
   * Latin-only topics never reach the LLM; failures fall back to the original topic.
   */
  async maybeExpand(topic: string): Promise<string | null> {
    const cleaned = cleanText(topic);
    if (!cleaned || !hasNonLatinScript(cleaned)) {
      return null;
    }

    try {
      const raw = await this.router.invoke(buildExpansionMessages(cleaned), {
        temperature: 0,
        maxTokens: 30,
      });
      const keywords = this.normalize(raw);
      this.logger.log(`topic expanded: "${cleaned}" -> "${keywords ?? ''}"`);
      return keywords;
    } catch (error) {
      this.logger.warn(`topic expansion skipped: ${errorMessage(error)}`);
      return null;
    }
  }

  private normalize(raw: string): string | null {
    const firstLine =
      raw
        .split(/\r?\n/)
        .map((line) => line.trim())
        .find((line) => line.length > 0) ?? '';
    const keywords = cleanText(firstLine)
      .replace(/^(?:[-*•]|\d+[.)])\s*/, '')
      .replace(/^keywords?\s*[:：]\s*/i, '')
      .replace(/["'“”‘’`]/g, '')
      .trim();
    return keywords ? truncate(keywords, EXPANSION_MAX_CHARS) : null;
  }
}
