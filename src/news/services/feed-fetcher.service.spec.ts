import { loadPipelineConfig } from '../config/pipeline.config';
import { FetchError } from '../errors/news.errors';
import { FeedSource } from '../types/news.types';
import { FeedFetcherService } from './feed-fetcher.service';

const rss = (items: string[]): string =>
  `<?xml version="1.0"?><rss><channel><title>Feed</title>${items.join('')}</channel></rss>`;

const item = (n: number): string =>
  `<item><title>Headline ${n}</title><link>https://news.example.com/${n}</link></item>`;

const feedSource = (url = 'https://feeds.example.com/rss'): FeedSource => ({
  url,
  allowPageFallback: false,
});

describe('FeedFetcherService', () => {
  const fetcher = new FeedFetcherService(loadPipelineConfig({}));
  let fetchMock: jest.SpyInstance;

  const respondWith = (body: string, status = 200): void => {
    fetchMock.mockImplementation(async () => new Response(body, { status }));
  };

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('caps the item count and keeps feed order', async () => {
    respondWith(rss(Array.from({ length: 20 }, (_, i) => item(i + 1))));

    const items = await fetcher.fetch(feedSource());

    expect(items).toHaveLength(15);
    expect(items[0].title).toBe('Headline 1');
    expect(items[14].title).toBe('Headline 15');
  });

  it('normalizes an RSS entry into a news item', async () => {
    respondWith(
      rss([
        `<item>
          <title>Chip stocks rally - Reuters</title>
          <link>https://www.reuters.com/markets/chips</link>
          <description>&lt;a href="https://www.reuters.com/markets/chips"&gt;Chip stocks rally&lt;/a&gt;&amp;nbsp;&lt;font&gt;Reuters&lt;/font&gt;</description>
          <pubDate>Mon, 19 Oct 2026 08:30:00 GMT</pubDate>
          <source url="https://www.reuters.com">Reuters</source>
        </item>`,
      ]),
    );

    const items = await fetcher.fetch(feedSource());

    expect(items).toEqual([
      {
        title: 'Chip stocks rally',
        link: 'https://www.reuters.com/markets/chips',
        summary: 'Chip stocks rally Reuters',
        publishedAt: '2026-10-19T08:30:00.000Z',
        sourceDomain: 'reuters.com',
      },
    ]);
  });

  it('drops entries repeating a link', async () => {
    respondWith(rss([item(1), item(1), item(2)]));

    const items = await fetcher.fetch(feedSource());

    expect(items.map((entry) => entry.link)).toEqual([
      'https://news.example.com/1',
      'https://news.example.com/2',
    ]);
  });

  it('reads Atom entries', async () => {
    respondWith(
      `<feed xmlns="http://www.w3.org/2005/Atom"><title>Blog</title>
        <entry>
          <title>Atom post</title>
          <link rel="alternate" href="https://blog.example.org/posts/1"/>
          <summary type="html">&lt;p&gt;Short summary&lt;/p&gt;</summary>
          <updated>2026-10-18T12:00:00Z</updated>
        </entry>
      </feed>`,
    );

    const items = await fetcher.fetch(feedSource());

    expect(items).toEqual([
      {
        title: 'Atom post',
        link: 'https://blog.example.org/posts/1',
        summary: 'Short summary',
        publishedAt: '2026-10-18T12:00:00.000Z',
        sourceDomain: 'blog.example.org',
      },
    ]);
  });

  it('raises FetchError on a non-2xx feed response', async () => {
    respondWith('unavailable', 503);

    await expect(fetcher.fetch(feedSource())).rejects.toMatchObject({
      name: 'FetchError',
      status: 503,
    });
  });

  it('raises FetchError when the request itself fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetcher.fetch(feedSource())).rejects.toBeInstanceOf(
      FetchError,
    );
  });

  it('turns a custom non-feed page into one item from its metadata', async () => {
    respondWith(
      `<html><head>
        <title>Local council approves new park</title>
        <meta property="og:title" content="OG title">
        <meta name="description" content="The council voted 7-2 to fund a riverside park.">
      </head><body><p>Body text</p></body></html>`,
    );

    const items = await fetcher.fetch({
      url: 'https://news.example.com/story',
      allowPageFallback: true,
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(items).toEqual([
      {
        title: 'Local council approves new park',
        link: 'https://news.example.com/story',
        summary: 'The council voted 7-2 to fund a riverside park.',
        publishedAt: null,
        sourceDomain: 'news.example.com',
      },
    ]);
  });

  it('returns no items for a page without title or description', async () => {
    respondWith('<html><body>No metadata</body></html>');

    const items = await fetcher.fetch({
      url: 'https://news.example.com/bare',
      allowPageFallback: true,
    });

    expect(items).toEqual([]);
  });

  it('treats a custom page that refuses access as no results', async () => {
    respondWith('forbidden', 403);

    const items = await fetcher.fetch({
      url: 'https://news.example.com/blocked',
      allowPageFallback: true,
    });

    expect(items).toEqual([]);
  });

  it('still raises FetchError when a custom url answers 5xx', async () => {
    respondWith('bad gateway', 502);

    await expect(
      fetcher.fetch({
        url: 'https://news.example.com/story',
        allowPageFallback: true,
      }),
    ).rejects.toMatchObject({ name: 'FetchError', status: 502 });
  });

  it('raises FetchError when a search feed answers with a non-feed page', async () => {
    respondWith('<html><body>consent wall</body></html>');

    await expect(
      fetcher.fetch(feedSource('https://news.google.com/rss/search?q=x')),
    ).rejects.toMatchObject({
      name: 'FetchError',
      message: 'feed response is not RSS/Atom',
    });
  });

  it('returns no items for a real feed without entries', async () => {
    respondWith(rss([]));

    await expect(fetcher.fetch(feedSource())).resolves.toEqual([]);
  });
});
