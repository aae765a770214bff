/**
 * PostgreSQL Database Schema
 *
 * Applied on every start; every statement is idempotent.
 */

export const SCHEMA = `
CREATE EXTENSION IF NOT EXISTS pgcrypto;
CREATE EXTENSION IF NOT EXISTS pg_trgm;

-- ═══════════════════════════════════════════════════════════════════════════════
-- Scraping Runs Table
-- One row per fetch-and-ingest cycle
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS scraping_runs (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  started_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  finished_at TIMESTAMPTZ,
  duration_seconds NUMERIC(10, 2),
  status VARCHAR(20) NOT NULL DEFAULT 'running'
    CHECK (status IN ('running', 'completed', 'failed')),
  triggered_by VARCHAR(20) NOT NULL DEFAULT 'scheduled'
    CHECK (triggered_by IN ('scheduled', 'manual')),
  sources_processed TEXT[] NOT NULL DEFAULT '{}',
  items_scraped INTEGER NOT NULL DEFAULT 0,
  items_failed INTEGER NOT NULL DEFAULT 0,
  items_duplicate INTEGER NOT NULL DEFAULT 0,
  errors JSONB NOT NULL DEFAULT '[]',
  error_message TEXT
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Publications Table
-- Durable published records, one per staging item at most
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS publications (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  scraping_item_id UUID UNIQUE,
  state VARCHAR(32) NOT NULL DEFAULT 'published'
    CHECK (state IN ('draft', 'published', 'discarded')),
  slug VARCHAR(160) NOT NULL UNIQUE,
  title VARCHAR(512) NOT NULL,
  summary TEXT NOT NULL DEFAULT '',
  body TEXT NOT NULL,
  category VARCHAR(80),
  tags TEXT[] NOT NULL DEFAULT '{}',
  content_sin_vueltas TEXT,
  content_lo_central TEXT,
  content_en_profundidad TEXT,
  media JSONB NOT NULL DEFAULT '[]',
  signing_identity VARCHAR(100),
  published_by VARCHAR(100) NOT NULL,
  origin_type VARCHAR(32) NOT NULL DEFAULT 'detected_media',
  published_at TIMESTAMPTZ,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Scraping Items Table
-- Staging area: every scraped article and its pipeline state
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS scraping_items (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),

  -- Origin
  source_media VARCHAR(32) NOT NULL
    CHECK (source_media IN ('lagaceta', 'clarin', 'infobae', 'lanacion', 'pagina12',
                            'perfil', 'ambito', 'cronista', 'other')),
  source_section VARCHAR(100),
  source_url TEXT NOT NULL,
  source_url_normalized TEXT NOT NULL,
  canonical_url TEXT,

  -- Raw content
  title TEXT,
  subtitle TEXT,
  summary TEXT,
  content TEXT NOT NULL,
  raw_html TEXT,
  author VARCHAR(255),
  article_date TIMESTAMPTZ,
  tags TEXT[] NOT NULL DEFAULT '{}',
  image_urls TEXT[] NOT NULL DEFAULT '{}',
  video_urls TEXT[] NOT NULL DEFAULT '{}',

  -- Dedup hashes
  content_hash VARCHAR(64) NOT NULL CHECK (length(content_hash) > 0),
  url_hash VARCHAR(64) NOT NULL CHECK (length(url_hash) > 0),

  -- Scraping traceability
  scraper_name VARCHAR(100) NOT NULL,
  scraper_version VARCHAR(20),
  scraping_run_id UUID REFERENCES scraping_runs(id) ON DELETE SET NULL,
  scraped_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  scraping_duration_ms INTEGER,

  -- Pipeline state
  state VARCHAR(32) NOT NULL DEFAULT 'scraped'
    CHECK (state IN ('scraped', 'ready_for_ai', 'processing_ai', 'ai_completed', 'error',
                     'ready_to_publish', 'published', 'discarded', 'duplicate')),
  state_updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  state_message TEXT,

  -- AI processing
  ai_title TEXT,
  ai_summary TEXT,
  ai_tags TEXT[],
  ai_category VARCHAR(80),
  ai_model VARCHAR(50),
  ai_prompt_version VARCHAR(20),
  ai_tokens_used INTEGER,
  ai_cost_usd NUMERIC(10, 6),
  ai_processing_duration_ms INTEGER,
  ai_processed_at TIMESTAMPTZ,
  ai_metadata JSONB,

  -- Errors and retries
  retry_count INTEGER NOT NULL DEFAULT 0,
  max_retries INTEGER NOT NULL DEFAULT 3,
  last_error TEXT,
  last_error_at TIMESTAMPTZ,
  error_trace TEXT,

  -- Publication link
  publication_id UUID REFERENCES publications(id) ON DELETE RESTRICT,
  published_at TIMESTAMPTZ,
  published_by VARCHAR(100),

  -- Audit
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  created_by VARCHAR(100),
  updated_by VARCHAR(100),

  extra_metadata JSONB,

  CONSTRAINT chk_retry_count_valid CHECK (retry_count <= max_retries),
  CONSTRAINT chk_published_has_publication CHECK (state <> 'published' OR publication_id IS NOT NULL),
  CONSTRAINT chk_article_date_not_future CHECK (article_date IS NULL OR article_date <= NOW())
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE UNIQUE INDEX IF NOT EXISTS idx_scraping_items_url_hash ON scraping_items(url_hash);
CREATE INDEX IF NOT EXISTS idx_scraping_items_content_hash ON scraping_items(content_hash);
CREATE INDEX IF NOT EXISTS idx_scraping_items_state_updated ON scraping_items(state, state_updated_at DESC);
CREATE INDEX IF NOT EXISTS idx_scraping_items_media_date ON scraping_items(source_media, article_date DESC NULLS LAST);
CREATE INDEX IF NOT EXISTS idx_scraping_items_scraped_at ON scraping_items(scraped_at DESC);
CREATE INDEX IF NOT EXISTS idx_scraping_items_errors ON scraping_items(state, retry_count) WHERE state = 'error';
CREATE INDEX IF NOT EXISTS idx_scraping_items_publication ON scraping_items(publication_id) WHERE publication_id IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_publications_published_by ON publications(published_by);
CREATE INDEX IF NOT EXISTS idx_publications_published_at ON publications(published_at DESC);
CREATE INDEX IF NOT EXISTS idx_scraping_items_run ON scraping_items(scraping_run_id) WHERE scraping_run_id IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_scraping_runs_started_at ON scraping_runs(started_at DESC);

-- Title similarity lookups
CREATE INDEX IF NOT EXISTS idx_scraping_items_ai_title_trgm
  ON scraping_items USING gin (LOWER(ai_title) gin_trgm_ops) WHERE ai_title IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_publications_title_trgm ON publications USING gin (LOWER(title) gin_trgm_ops);
`;

export const MIGRATIONS: string[] = [
  // Each migration must be idempotent (IF NOT EXISTS, etc.)
  // Link staging rows created before scraping_runs existed
  `DO $$
   BEGIN
     IF NOT EXISTS (
       SELECT 1 FROM information_schema.table_constraints
       WHERE table_name = 'scraping_items' AND constraint_name = 'fk_scraping_items_run'
     ) AND NOT EXISTS (
       SELECT 1 FROM information_schema.referential_constraints rc
       JOIN information_schema.key_column_usage kcu ON kcu.constraint_name = rc.constraint_name
       WHERE kcu.table_name = 'scraping_items' AND kcu.column_name = 'scraping_run_id'
     ) THEN
       UPDATE scraping_items SET scraping_run_id = NULL
       WHERE scraping_run_id IS NOT NULL
         AND scraping_run_id NOT IN (SELECT id FROM scraping_runs);
       ALTER TABLE scraping_items ADD CONSTRAINT fk_scraping_items_run
         FOREIGN KEY (scraping_run_id) REFERENCES scraping_runs(id) ON DELETE SET NULL;
     END IF;
   END $$`,
];

/**
 * Name of the unique index guarding one staged row per normalized URL
 */
export const URL_HASH_UNIQUE_INDEX = 'idx_scraping_items_url_hash';
