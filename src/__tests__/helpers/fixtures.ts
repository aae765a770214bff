/**
 * Test data builders
 */

import type { RawArticle, StagingInput } from '../../types/index.js';

export function stagingInput(overrides: Partial<StagingInput> = {}): StagingInput {
  return {
    sourceMedia: 'lagaceta',
    sourceSection: 'politica',
    sourceUrl: 'https://www.lagaceta.com.ar/nota/1001/politica/sesion-legislatura.html',
    canonicalUrl: null,
    title: 'La Legislatura aprobó el presupuesto provincial',
    subtitle: null,
    summary: 'El proyecto obtuvo 38 votos afirmativos tras una sesión de seis horas.',
    content:
      'La Legislatura aprobó anoche el presupuesto provincial para el próximo año. ' +
      'El proyecto obtuvo 38 votos afirmativos tras una sesión de seis horas.',
    rawHtml: null,
    author: 'Redacción',
    articleDate: new Date('2025-02-28T09:00:00.000Z'),
    tags: ['legislatura', 'presupuesto'],
    imageUrls: ['https://img.example.test/legislatura.jpg'],
    videoUrls: [],
    scraperName: 'test-scraper',
    scraperVersion: '1.0.0',
    scrapingRunId: null,
    scrapingDurationMs: 120,
    ...overrides,
  };
}

export function rawArticle(overrides: Partial<RawArticle> = {}): RawArticle {
  return {
    sourceMedia: 'infobae',
    sourceSection: 'economia',
    url: 'https://www.infobae.com/economia/2025/02/27/la-inflacion-de-febrero/',
    title: 'La inflación de febrero se desaceleró por tercer mes',
    summary: 'El índice de precios marcó la variación más baja del último año.',
    content:
      'El índice de precios al consumidor de febrero mostró la variación más baja del último año, ' +
      'según el informe oficial publicado este jueves.',
    author: 'Equipo de Economía',
    articleDate: '2025-02-27T15:30:00.000Z',
    tags: ['inflacion'],
    imageUrls: [],
    ...overrides,
  };
}
