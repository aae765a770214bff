/**
 * Producer Module
 *
 * Feed-based producers that hand raw articles to the ingestion gateway
 */

export { RssProducer, fetchFeeds, createParser, parseRssDate, toRawArticle, type FetchFeedsOptions } from './rss-fetcher.js';
export type { FeedItem, FeedParser, FetchResult, Producer } from './types.js';
