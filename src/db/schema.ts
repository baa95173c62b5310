/**
 * SQLite Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Products Table
-- GPUs and board variants, keyed by display name
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS products (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  vendor TEXT NOT NULL DEFAULT 'Unknown',
  description TEXT,
  image_url TEXT,
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'inactive')),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Spec Categories Table
-- Short codes are assigned as max(code) + 1 within a domain tag
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS spec_categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  domain_tag TEXT NOT NULL,
  code INTEGER NOT NULL,
  name TEXT NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE (domain_tag, name),
  UNIQUE (domain_tag, code)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Specs Table
-- One product's spec set; replaced wholesale on re-ingestion
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS specs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  product_id INTEGER NOT NULL,
  category_code INTEGER NOT NULL,
  name TEXT NOT NULL,
  value TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (product_id) REFERENCES products(id) ON DELETE CASCADE
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Reviews Table
-- updated_at only moves when the body changes
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS reviews (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  master_product_id INTEGER NOT NULL,
  type TEXT NOT NULL,
  title TEXT NOT NULL,
  body TEXT NOT NULL DEFAULT '',
  main_url TEXT,
  page_url TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT,
  UNIQUE (master_product_id, type, title),
  FOREIGN KEY (master_product_id) REFERENCES products(id) ON DELETE CASCADE
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Review Data Table
-- Facts extracted from a review page
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS review_data (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  review_id INTEGER NOT NULL,
  data_type TEXT NOT NULL,
  data_key TEXT NOT NULL,
  data_value TEXT NOT NULL,
  data_unit TEXT NOT NULL DEFAULT '',
  product_name TEXT NOT NULL DEFAULT '',
  FOREIGN KEY (review_id) REFERENCES reviews(id) ON DELETE CASCADE
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes for Performance
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_specs_product ON specs(product_id);
CREATE INDEX IF NOT EXISTS idx_specs_product_category ON specs(product_id, category_code);
CREATE INDEX IF NOT EXISTS idx_reviews_master ON reviews(master_product_id);
CREATE INDEX IF NOT EXISTS idx_reviews_main_url ON reviews(main_url);
CREATE INDEX IF NOT EXISTS idx_review_data_review ON review_data(review_id);
`;
