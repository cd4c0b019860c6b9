// DDL for a fresh database. Statements are idempotent so hosts can run them on
// every start; they mirror the drizzle table definitions in schema.ts.

export const BOOTSTRAP_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS blog_authors (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    avatar_url TEXT,
    bio TEXT,
    external_id TEXT UNIQUE,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS blog_posts (
    id TEXT PRIMARY KEY,
    author_id TEXT NOT NULL REFERENCES blog_authors(id) ON DELETE RESTRICT,
    title TEXT NOT NULL,
    slug TEXT NOT NULL UNIQUE,
    content_markdown TEXT NOT NULL,
    content_html TEXT,
    excerpt TEXT,
    status TEXT NOT NULL DEFAULT 'draft',
    featured_image_url TEXT,
    featured_image_alt TEXT,
    meta_title TEXT,
    meta_description TEXT,
    canonical_url TEXT,
    published_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS blog_posts_status_idx ON blog_posts (status)`,
  `CREATE INDEX IF NOT EXISTS blog_posts_published_at_idx ON blog_posts (published_at)`,

  `CREATE TABLE IF NOT EXISTS blog_images (
    id TEXT PRIMARY KEY,
    author_id TEXT NOT NULL REFERENCES blog_authors(id) ON DELETE RESTRICT,
    post_id TEXT REFERENCES blog_posts(id) ON DELETE SET NULL,
    filename TEXT NOT NULL,
    storage_key TEXT NOT NULL,
    url TEXT NOT NULL,
    content_type TEXT NOT NULL,
    file_size INTEGER,
    alt_text TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS blog_keywords (
    id TEXT PRIMARY KEY,
    keyword TEXT NOT NULL,
    monthly_searches INTEGER,
    competition TEXT,
    competition_index INTEGER,
    three_month_change TEXT,
    yoy_change TEXT,
    top_bid_low REAL,
    top_bid_high REAL,
    category TEXT NOT NULL,
    intent TEXT NOT NULL,
    is_question INTEGER NOT NULL DEFAULT 0,
    is_branded INTEGER NOT NULL DEFAULT 0,
    audience TEXT NOT NULL,
    blog_score INTEGER NOT NULL DEFAULT 0,
    suggested_topics TEXT NOT NULL DEFAULT '[]',
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS blog_keywords_keyword_idx ON blog_keywords (keyword)`,
  `CREATE INDEX IF NOT EXISTS blog_keywords_category_idx ON blog_keywords (category)`,
  `CREATE INDEX IF NOT EXISTS blog_keywords_audience_idx ON blog_keywords (audience)`,
  `CREATE INDEX IF NOT EXISTS blog_keywords_blog_score_idx ON blog_keywords (blog_score)`,

  `CREATE TABLE IF NOT EXISTS blog_feature_screenshots (
    id TEXT PRIMARY KEY,
    feature_key TEXT NOT NULL,
    position INTEGER NOT NULL DEFAULT 0,
    url TEXT NOT NULL,
    storage_key TEXT NOT NULL,
    alt_text TEXT,
    caption TEXT,
    step_description TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS blog_feature_screenshots_feature_position_idx
    ON blog_feature_screenshots (feature_key, position)`,
];
