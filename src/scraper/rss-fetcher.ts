/**
 * RSS Feed Producer
 *
 * Reads every feed of the configured media sources and maps feed items
 * to raw article records. Deduplication is left to the staging upsert.
 */

import Parser from 'rss-parser';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { MediaSource, SourceFeed } from '../config/sources.js';
import type { RawArticle } from '../types/index.js';
import type { FeedItem, FeedParser, FetchResult, Producer } from './types.js';

const SCRAPER_VERSION = '1.0.0';
const IMAGE_EXTENSIONS = /\.(jpe?g|png|gif|webp|avif)(\?.*)?$/i;

export interface FetchFeedsOptions {
  parser?: FeedParser;
  now?: () => Date;
}

/**
 * Create RSS parser with custom headers
 */
export function createParser(): FeedParser {
  return new Parser<Record<string, unknown>, { author?: string }>({
    headers: {
      'User-Agent': config.scraper.userAgent,
      Accept: 'application/rss+xml, application/xml, text/xml, */*',
    },
    timeout: config.scraper.timeout,
    customFields: { item: ['author'] },
  });
}

/**
 * Parse RSS date, null when missing or unreadable
 */
export function parseRssDate(dateStr: string | undefined): Date | null {
  if (!dateStr) {
    return null;
  }
  const date = new Date(dateStr);
  return isNaN(date.getTime()) ? null : date;
}

function isImageEnclosure(enclosure: { url: string; type?: string }): boolean {
  return enclosure.type ? enclosure.type.startsWith('image/') : IMAGE_EXTENSIONS.test(enclosure.url);
}

function cleanText(value: string | undefined): string | null {
  const text = value?.trim();
  return text ? text : null;
}

/**
 * Map one feed item, or null when it has no link or title
 */
export function toRawArticle(item: FeedItem, source: MediaSource, feed: SourceFeed): RawArticle | null {
  const url = cleanText(item.link);
  const title = cleanText(item.title);
  if (!url || !title) {
    return null;
  }

  const summary = cleanText(item.contentSnippet) ?? cleanText(item.summary);
  const html = cleanText(item.content);

  return {
    sourceMedia: source.media,
    sourceSection: feed.section,
    url,
    title,
    summary,
    content: summary ?? title,
    rawHtml: html,
    author: cleanText(item.creator) ?? cleanText(item.author),
    articleDate: parseRssDate(item.isoDate ?? item.pubDate),
    tags: (item.categories ?? []).filter((tag) => typeof tag === 'string' && tag.trim() !== '').map((tag) => tag.trim()),
    imageUrls: item.enclosure && isImageEnclosure(item.enclosure) ? [item.enclosure.url] : [],
    scraperName: `${source.media}-rss`,
    scraperVersion: SCRAPER_VERSION,
  };
}

/**
 * Fetch articles from a single RSS feed
 */
async function fetchFeed(
  parser: FeedParser,
  source: MediaSource,
  feed: SourceFeed
): Promise<RawArticle[]> {
  logger.info({ media: source.media, section: feed.section, url: feed.url }, 'Fetching RSS feed');

  const result = await parser.parseURL(feed.url);
  const articles: RawArticle[] = [];

  for (const item of result.items) {
    const article = toRawArticle(item, source, feed);
    if (article) {
      articles.push(article);
    }
  }

  logger.info({ media: source.media, section: feed.section, itemCount: result.items.length }, 'RSS feed parsed');
  return articles;
}

/**
 * Fetch every feed of `sources`. A failing feed is counted and logged;
 * the others still run.
 */
export async function fetchFeeds(sources: MediaSource[], options: FetchFeedsOptions = {}): Promise<FetchResult> {
  const parser = options.parser ?? createParser();
  const now = options.now ?? (() => new Date());
  const fetchedAt = now();

  const result: FetchResult = { articles: [], fetchedAt, feedsProcessed: 0, totalFound: 0, errors: 0, failures: [] };

  logger.info({ sourceCount: sources.length }, 'Starting RSS feed fetch');

  for (const source of sources) {
    const seen = new Set<string>();
    let taken = 0;

    for (const feed of source.feeds) {
      try {
        const articles = await fetchFeed(parser, source, feed);
        result.feedsProcessed++;
        result.totalFound += articles.length;

        for (const article of articles) {
          // Stories often appear in more than one section feed
          if (taken >= source.maxArticlesPerRun || seen.has(article.url)) continue;
          seen.add(article.url);
          result.articles.push(article);
          taken++;
        }
      } catch (error) {
        logger.error({ error, media: source.media, url: feed.url }, 'Failed to fetch RSS feed');
        result.errors++;
        result.failures.push(`${feed.url}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  logger.info(
    {
      feedsProcessed: result.feedsProcessed,
      totalFound: result.totalFound,
      articles: result.articles.length,
      errors: result.errors,
      durationMs: now().getTime() - fetchedAt.getTime(),
    },
    'RSS fetch completed'
  );

  return result;
}

export class RssProducer implements Producer {
  readonly name = 'rss';

  constructor(
    private readonly mediaSources: MediaSource[],
    private readonly options: FetchFeedsOptions = {}
  ) {}

  get sources(): string[] {
    return this.mediaSources.map((source) => source.media);
  }

  produce(): Promise<FetchResult> {
    return fetchFeeds(this.mediaSources, this.options);
  }
}
