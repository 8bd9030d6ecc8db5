import { Inject, Injectable, Logger } from '@nestjs/common';
import { FEED_ACCEPT, USER_AGENT } from '../config/news.constants';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { FetchError } from '../errors/news.errors';
import { FeedSource, NewsItem } from '../types/news.types';
import { parseDateToIso } from '../utils/date.util';
import { safeFetch } from '../utils/http.util';
import {
  cleanText,
  hostOf,
  stripSourceSuffix,
  truncate,
} from '../utils/text.util';

interface FeedEntry {
  title: string;
  link: string;
  summary: string;
  publishedAt: string | null;
}

const FEED_ROOT_RE = /<(?:rss|feed|rdf:RDF)\b/i;
const ATTRIBUTE_RE = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

@Injectable()
export class FeedFetcherService {
  private readonly logger = new Logger(FeedFetcherService.name);

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  async fetch(source: FeedSource): Promise<NewsItem[]> {
    const startedAt = Date.now();
    this.logger.log(`fetch start: ${this.describeUrl(source.url)}`);

    const response = await safeFetch(source.url, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT, Accept: FEED_ACCEPT },
      timeoutMs: this.config.feedTimeoutMs,
    });
    if (!response.ok) {
      if (source.allowPageFallback && this.isBlocked(response.status)) {
        this.logger.warn(`page blocked: ${response.status} ${source.url}`);
        return [];
      }
      this.logger.warn(`feed fetch failed: ${response.status} ${source.url}`);
      throw new FetchError(
        source.url,
        response.status === 0
          ? `feed request failed: ${response.raw}`
          : `feed request failed with HTTP ${response.status}`,
        response.status || undefined,
      );
    }

    const entries = this.parseFeed(response.raw, source.url);
    if (entries.length === 0) {
      if (source.allowPageFallback) {
        this.logger.log(`no feed entries, reading as single page: ${source.url}`);
        const items = this.pageItems(source.url, response.raw);
        this.logger.log(
          `fetch done(page): items=${items.length} elapsedMs=${Date.now() - startedAt}`,
        );
        return items;
      }
      if (!FEED_ROOT_RE.test(response.raw)) {
        this.logger.warn(`feed response is not RSS/Atom: ${source.url}`);
        throw new FetchError(source.url, 'feed response is not RSS/Atom');
      }
    }

    const items = this.toNewsItems(entries);
    this.logger.log(
      `fetch done: entries=${entries.length} items=${items.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return items;
  }

  // 4xx on a custom page means it refuses us; 5xx and network errors stay fetch failures
  private isBlocked(status: number): boolean {
    return status >= 400 && status < 500;
  }

  private toNewsItems(entries: FeedEntry[]): NewsItem[] {
    const seen = new Set<string>();
    const items: NewsItem[] = [];
    for (const entry of entries) {
      if (seen.has(entry.link)) {
        continue;
      }
      seen.add(entry.link);
      items.push(
        Object.freeze({
          ...entry,
          sourceDomain: hostOf(entry.link),
        }),
      );
      if (items.length >= this.config.maxNewsCount) {
        break;
      }
    }
    return items;
  }

  private parseFeed(xml: string, baseUrl: string): FeedEntry[] {
    const blocks: string[] =
      xml.match(/<item\b[\s\S]*?<\/item>|<entry\b[\s\S]*?<\/entry>/gi) ?? [];
    return blocks
      .map((block) => {
        const sourceName = this.extractTag(block, 'source');
        return {
          title: stripSourceSuffix(this.extractTag(block, 'title'), sourceName),
          link: this.resolveLink(this.extractLink(block), baseUrl),
          summary:
            this.extractTag(block, 'description') ||
            this.extractTag(block, 'summary') ||
            this.extractTag(block, 'content:encoded') ||
            this.extractTag(block, 'content'),
          publishedAt: this.extractPublishedAt(block),
        };
      })
      .filter((entry) => entry.title && entry.link);
  }

  private extractLink(block: string): string {
    const text = this.extractTag(block, 'link');
    if (text) {
      return text;
    }

    // Atom: <link rel="alternate" href="..."/>
    const linkTags = block.match(/<link\b[^>]*>/gi) ?? [];
    let fallback = '';
    for (const tag of linkTags) {
      const attrs = this.parseAttributes(tag);
      const href = attrs.href ?? '';
      if (!href) {
        continue;
      }
      const rel = (attrs.rel ?? 'alternate').toLowerCase();
      if (rel === 'alternate') {
        return cleanText(href);
      }
      fallback = fallback || cleanText(href);
    }
    return fallback || this.extractTag(block, 'guid');
  }

  private resolveLink(link: string, baseUrl: string): string {
    if (!link) {
      return '';
    }
    try {
      const resolved = new URL(link, baseUrl);
      return resolved.protocol === 'http:' || resolved.protocol === 'https:'
        ? resolved.toString()
        : '';
    } catch {
      return '';
    }
  }

  private extractPublishedAt(block: string): string | null {
    const tags = ['pubDate', 'published', 'updated', 'dc:date'];
    for (const tag of tags) {
      const iso = parseDateToIso(this.extractTag(block, tag));
      if (iso) {
        return iso;
      }
    }
    return null;
  }

  private pageItems(url: string, html: string): NewsItem[] {
    const meta = this.extractMeta(html);
    const title =
      this.extractTag(html, 'title') ||
      meta.get('og:title') ||
      meta.get('twitter:title') ||
      '';
    const description =
      meta.get('description') ||
      meta.get('og:description') ||
      meta.get('twitter:description') ||
      '';

    if (!title && !description) {
      this.logger.warn(`page has neither title nor description: ${url}`);
      return [];
    }

    return [
      Object.freeze({
        title: title || truncate(description, 120),
        link: url,
        summary: description,
        publishedAt: parseDateToIso(meta.get('article:published_time') ?? ''),
        sourceDomain: hostOf(url),
      }),
    ];
  }

  private extractMeta(html: string): Map<string, string> {
    const out = new Map<string, string>();
    const tags = html.match(/<meta\b[^>]*>/gi) ?? [];
    for (const tag of tags) {
      const attrs = this.parseAttributes(tag);
      const key = (attrs.name ?? attrs.property ?? '').toLowerCase();
      const content = cleanText(attrs.content ?? '');
      if (key && content && !out.has(key)) {
        out.set(key, content);
      }
    }
    return out;
  }

  private parseAttributes(tag: string): Record<string, string> {
    const attrs: Record<string, string> = {};
    for (const match of tag.matchAll(ATTRIBUTE_RE)) {
      attrs[match[1].toLowerCase()] = match[2] ?? match[3] ?? '';
    }
    return attrs;
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return cleanText(match[1]);
  }

  private describeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      const q = (parsed.searchParams.get('q') || '').slice(0, 36);
      return q ? `host=${parsed.hostname} q=${q}` : `host=${parsed.hostname}`;
    } catch {
      return `url=${url.slice(0, 80)}`;
    }
  }
}
