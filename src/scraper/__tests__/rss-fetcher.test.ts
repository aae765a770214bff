/**
 * RSS Producer Tests
 *
 * Feeds are served by a stub parser keyed by URL.
 */

import { describe, expect, it, vi } from 'vitest';
import { fetchFeeds, parseRssDate, toRawArticle } from '../rss-fetcher.js';
import type { FeedItem, FeedParser } from '../types.js';
import type { MediaSource } from '../../config/sources.js';

const SOURCE: MediaSource = {
  name: 'La Gaceta',
  media: 'lagaceta',
  baseUrl: 'https://www.lagaceta.com.ar',
  active: true,
  feeds: [
    { section: 'politica', url: 'https://feeds.example.test/politica.xml' },
    { section: 'economia', url: 'https://feeds.example.test/economia.xml' },
  ],
  maxArticlesPerRun: 10,
  autoPublish: false,
  autoPublishDelayMinutes: 15,
};

const NOW = new Date('2025-03-01T12:00:00.000Z');

function item(n: number, overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    title: `Noticia ${n}`,
    link: `https://www.lagaceta.com.ar/nota/${n}`,
    isoDate: '2025-03-01T10:00:00.000Z',
    contentSnippet: `Resumen de la noticia ${n}`,
    ...overrides,
  };
}

function stubParser(feeds: Record<string, FeedItem[] | Error>): FeedParser {
  return {
    parseURL: vi.fn(async (url: string) => {
      const feed = feeds[url];
      if (feed === undefined) throw new Error(`unexpected feed ${url}`);
      if (feed instanceof Error) throw feed;
      return { items: feed };
    }),
  };
}

describe('toRawArticle', () => {
  const feed = { section: 'politica', url: 'https://feeds.example.test/politica.xml' };

  it('should map feed fields onto a raw article', () => {
    const article = toRawArticle(
      item(1, {
        title: '  Sesión en la Legislatura ',
        creator: 'Redacción',
        content: '<p>Resumen de la noticia 1</p>',
        categories: ['Política', ' Legislatura '],
        enclosure: { url: 'https://img.example.test/1.jpg', type: 'image/jpeg' },
      }),
      SOURCE,
      feed
    );

    expect(article).toEqual({
      sourceMedia: 'lagaceta',
      sourceSection: 'politica',
      url: 'https://www.lagaceta.com.ar/nota/1',
      title: 'Sesión en la Legislatura',
      summary: 'Resumen de la noticia 1',
      content: 'Resumen de la noticia 1',
      rawHtml: '<p>Resumen de la noticia 1</p>',
      author: 'Redacción',
      articleDate: new Date('2025-03-01T10:00:00.000Z'),
      tags: ['Política', 'Legislatura'],
      imageUrls: ['https://img.example.test/1.jpg'],
      scraperName: 'lagaceta-rss',
      scraperVersion: '1.0.0',
    });
  });

  it('should skip items without a link', () => {
    expect(toRawArticle(item(1, { link: undefined }), SOURCE, feed)).toBeNull();
  });

  it('should fall back to the title when the item has no text', () => {
    const article = toRawArticle(item(2, { contentSnippet: undefined }), SOURCE, feed);

    expect(article?.content).toBe('Noticia 2');
    expect(article?.summary).toBeNull();
  });

  it('should ignore non-image enclosures', () => {
    const article = toRawArticle(
      item(3, { enclosure: { url: 'https://cdn.example.test/audio.mp3', type: 'audio/mpeg' } }),
      SOURCE,
      feed
    );

    expect(article?.imageUrls).toEqual([]);
  });
});

describe('parseRssDate', () => {
  it('should return null for missing or unreadable dates', () => {
    expect(parseRssDate(undefined)).toBeNull();
    expect(parseRssDate('ayer por la tarde')).toBeNull();
  });

  it('should parse RFC 822 dates', () => {
    expect(parseRssDate('Sat, 01 Mar 2025 09:30:00 GMT')).toEqual(new Date('2025-03-01T09:30:00.000Z'));
  });
});

describe('fetchFeeds', () => {
  it('should keep going when one feed fails', async () => {
    const parser = stubParser({
      'https://feeds.example.test/politica.xml': new Error('503 Service Unavailable'),
      'https://feeds.example.test/economia.xml': [item(1), item(2)],
    });

    const result = await fetchFeeds([SOURCE], { parser, now: () => NOW });

    expect(result.errors).toBe(1);
    expect(result.feedsProcessed).toBe(1);
    expect(result.articles.map((article) => article.url)).toEqual([
      'https://www.lagaceta.com.ar/nota/1',
      'https://www.lagaceta.com.ar/nota/2',
    ]);
    expect(result.articles[0]?.sourceSection).toBe('economia');
    expect(result.failures).toEqual(['https://feeds.example.test/politica.xml: 503 Service Unavailable']);
  });

  it('should leave the run id to the ingestion step', async () => {
    const parser = stubParser({
      'https://feeds.example.test/politica.xml': [item(1)],
      'https://feeds.example.test/economia.xml': [],
    });

    const result = await fetchFeeds([SOURCE], { parser, now: () => NOW });

    expect(result.articles[0]).not.toHaveProperty('scrapingRunId');
  });

  it('should take a story listed in two sections once', async () => {
    const parser = stubParser({
      'https://feeds.example.test/politica.xml': [item(1), item(2)],
      'https://feeds.example.test/economia.xml': [item(2), item(3)],
    });

    const result = await fetchFeeds([SOURCE], { parser, now: () => NOW });

    expect(result.totalFound).toBe(4);
    expect(result.articles).toHaveLength(3);
    expect(result.articles[1]?.sourceSection).toBe('politica');
  });

  it('should stop at the per-source article cap', async () => {
    const parser = stubParser({
      'https://feeds.example.test/politica.xml': [item(1), item(2)],
      'https://feeds.example.test/economia.xml': [item(3)],
    });

    const result = await fetchFeeds([{ ...SOURCE, maxArticlesPerRun: 2 }], { parser, now: () => NOW });

    expect(result.articles.map((article) => article.title)).toEqual(['Noticia 1', 'Noticia 2']);
  });
});
