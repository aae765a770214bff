/**
 * Media source catalogue
 *
 * Which outlets feed the staging table, where their feeds live and
 * whether their items may be published without an operator.
 */

import type { SourceMedia } from '../types/index.js';

export interface SourceFeed {
  section: string;
  url: string;
}

export interface MediaSource {
  name: string;
  media: SourceMedia;
  baseUrl: string;
  active: boolean;
  feeds: SourceFeed[];
  maxArticlesPerRun: number;
  autoPublish: boolean;
  /** Review window before auto-publish picks an item up */
  autoPublishDelayMinutes: number;
}

export const MEDIA_SOURCES: MediaSource[] = [
  {
    name: 'La Gaceta',
    media: 'lagaceta',
    baseUrl: 'https://www.lagaceta.com.ar',
    active: true,
    feeds: [
      { section: 'politica', url: 'https://www.lagaceta.com.ar/rss/politica.xml' },
      { section: 'economia', url: 'https://www.lagaceta.com.ar/rss/economia.xml' },
    ],
    maxArticlesPerRun: 50,
    autoPublish: false,
    autoPublishDelayMinutes: 15,
  },
  {
    name: 'Infobae',
    media: 'infobae',
    baseUrl: 'https://www.infobae.com',
    active: true,
    feeds: [{ section: 'portada', url: 'https://www.infobae.com/feeds/rss/' }],
    maxArticlesPerRun: 50,
    autoPublish: false,
    autoPublishDelayMinutes: 30,
  },
  {
    name: 'Página/12',
    media: 'pagina12',
    baseUrl: 'https://www.pagina12.com.ar',
    active: false,
    feeds: [{ section: 'portada', url: 'https://www.pagina12.com.ar/rss/portada' }],
    maxArticlesPerRun: 30,
    autoPublish: false,
    autoPublishDelayMinutes: 15,
  },
];

/**
 * Editorial categories the AI step may assign
 */
export const VALID_CATEGORIES = [
  'Ciencia',
  'Cultura',
  'Deportes',
  'Economía',
  'Educación',
  'Investigación',
  'Medio Ambiente',
  'Política',
  'Salud',
  'Sociedad',
  'Tecnología',
  'Turismo',
] as const;

export function getSource(media: SourceMedia): MediaSource | undefined {
  return MEDIA_SOURCES.find((source) => source.media === media);
}

export function getActiveSources(): MediaSource[] {
  return MEDIA_SOURCES.filter((source) => source.active);
}
