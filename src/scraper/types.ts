/**
 * Producer Types
 */

import type { RawArticle } from '../types/index.js';

/**
 * Anything that yields raw articles for the ingestion gateway
 */
export interface Producer {
  readonly name: string;
  /** Source media this producer reads, recorded on the scraping run */
  readonly sources: string[];
  produce(): Promise<FetchResult>;
}

/**
 * Producer run with counters
 */
export interface FetchResult {
  articles: RawArticle[];
  fetchedAt: Date;
  feedsProcessed: number;
  totalFound: number;
  errors: number;
  /** One line per failed feed */
  failures: string[];
}

/**
 * The fields of a parsed feed item the producer reads
 */
export interface FeedItem {
  title?: string;
  link?: string;
  guid?: string;
  pubDate?: string;
  isoDate?: string;
  creator?: string;
  author?: string;
  content?: string;
  contentSnippet?: string;
  summary?: string;
  categories?: string[];
  enclosure?: { url: string; type?: string };
}

/**
 * Feed parsing seam; rss-parser in production
 */
export interface FeedParser {
  parseURL(url: string): Promise<{ items: FeedItem[] }>;
}
