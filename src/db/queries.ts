/**
 * Database Queries and Operations
 *
 * Products, spec categories and spec sets.
 */

import type Database from 'better-sqlite3';
import { getDatabase, withTransaction } from './index.js';
import type {
  Product,
  ProductAttributes,
  ProductRef,
  ProductStatus,
  Spec,
  SpecCategory,
  SpecRecord,
} from '../types/index.js';

const CATEGORY_INSERT_ATTEMPTS = 3;

function now(): string {
  return new Date().toISOString();
}

// ═══════════════════════════════════════════════════════════════════════════════
// Product Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Find a product by its exact display name
 */
export function findProductByName(name: string): ProductRef | null {
  const db = getDatabase();
  const row = db.prepare('SELECT id, name FROM products WHERE name = ?').get(name) as
    | ProductRefRow
    | undefined;
  return row ? { id: row.id, name: row.name } : null;
}

/**
 * Find the first product whose name contains the fragment
 */
export function findProductByNameFragment(fragment: string): ProductRef | null {
  const db = getDatabase();
  const pattern = `%${escapeLike(fragment)}%`;
  const row = db
    .prepare("SELECT id, name FROM products WHERE name LIKE ? ESCAPE '\\' ORDER BY id LIMIT 1")
    .get(pattern) as ProductRefRow | undefined;
  return row ? { id: row.id, name: row.name } : null;
}

/**
 * Get product by ID
 */
export function getProductById(id: number): Product | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM products WHERE id = ?').get(id) as ProductRow | undefined;
  return row ? mapProductRow(row) : null;
}

/**
 * All stored product names, for the per-run name cache
 */
export function listProductRefs(): ProductRef[] {
  const db = getDatabase();
  const rows = db.prepare('SELECT id, name FROM products ORDER BY id').all() as ProductRefRow[];
  return rows.map((row) => ({ id: row.id, name: row.name }));
}

/**
 * Insert a product, or update every supplied attribute of the existing row
 * with the same name. created_at is never rewritten.
 */
export function upsertProduct(attrs: ProductAttributes): { id: number; created: boolean } {
  return withTransaction((db) => upsertProductRow(db, attrs));
}

function upsertProductRow(
  db: Database.Database,
  attrs: ProductAttributes
): { id: number; created: boolean } {
  const timestamp = now();
  const existing = db.prepare('SELECT * FROM products WHERE name = ?').get(attrs.name) as
    | ProductRow
    | undefined;

  if (!existing) {
    const result = db
      .prepare(
        `
      INSERT INTO products (name, vendor, description, image_url, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        attrs.name,
        attrs.vendor,
        attrs.description ?? null,
        attrs.imageUrl ?? null,
        attrs.status ?? 'active',
        timestamp,
        timestamp
      );
    return { id: Number(result.lastInsertRowid), created: true };
  }

  db.prepare(
    `
    UPDATE products
    SET vendor = ?, description = ?, image_url = ?, status = ?, updated_at = ?
    WHERE id = ?
  `
  ).run(
    attrs.vendor,
    attrs.description !== undefined ? attrs.description : existing.description,
    attrs.imageUrl !== undefined ? attrs.imageUrl : existing.image_url,
    attrs.status ?? existing.status,
    timestamp,
    existing.id
  );

  return { id: existing.id, created: false };
}

/**
 * Advance a product's updated_at
 */
function touchProduct(db: Database.Database, productId: number): void {
  db.prepare('UPDATE products SET updated_at = ? WHERE id = ?').run(now(), productId);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Spec Category Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Look up a category by name, creating it with code max(code) + 1 when absent
 */
export function getOrCreateCategory(name: string, domainTag: string): SpecCategory {
  return withTransaction((db) => getOrCreateCategoryRow(db, name, domainTag));
}

function getOrCreateCategoryRow(
  db: Database.Database,
  name: string,
  domainTag: string
): SpecCategory {
  const select = db.prepare(
    'SELECT id, domain_tag, code, name FROM spec_categories WHERE domain_tag = ? AND name = ?'
  );

  for (let attempt = 0; attempt < CATEGORY_INSERT_ATTEMPTS; attempt++) {
    const existing = select.get(domainTag, name) as CategoryRow | undefined;
    if (existing) {
      return mapCategoryRow(existing);
    }

    const { next } = db
      .prepare('SELECT COALESCE(MAX(code), 0) + 1 AS next FROM spec_categories WHERE domain_tag = ?')
      .get(domainTag) as { next: number };

    db.prepare(
      `
      INSERT INTO spec_categories (domain_tag, code, name, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `
    ).run(domainTag, next, name, now());
  }

  const created = select.get(domainTag, name) as CategoryRow | undefined;
  if (!created) {
    throw new Error(`Could not assign a code to category "${name}"`);
  }
  return mapCategoryRow(created);
}

/**
 * List categories of a domain, ordered by code
 */
export function listCategories(domainTag: string): SpecCategory[] {
  const db = getDatabase();
  const rows = db
    .prepare('SELECT id, domain_tag, code, name FROM spec_categories WHERE domain_tag = ? ORDER BY code')
    .all(domainTag) as CategoryRow[];
  return rows.map(mapCategoryRow);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Spec Operations
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProductWriteResult {
  productId: number;
  created: boolean;
  specCount: number;
}

/**
 * Upsert a product and replace its whole spec set in one transaction
 */
export function upsertProductWithSpecs(
  attrs: ProductAttributes,
  specs: readonly SpecRecord[],
  domainTag: string
): ProductWriteResult {
  return withTransaction((db) => {
    const { id, created } = upsertProductRow(db, attrs);
    const codes = resolveCategoryCodes(db, specs, domainTag);

    if (!created) {
      db.prepare('DELETE FROM specs WHERE product_id = ?').run(id);
    }

    insertSpecs(db, id, specs, codes);
    return { productId: id, created, specCount: specs.length };
  });
}

/**
 * Replace only the categories named by the incoming specs, leaving the rest
 * of the product's spec set in place
 */
export function replaceSpecCategories(
  productId: number,
  specs: readonly SpecRecord[],
  domainTag: string
): number {
  if (specs.length === 0) {
    return 0;
  }

  return withTransaction((db) => {
    const codes = resolveCategoryCodes(db, specs, domainTag);
    const remove = db.prepare('DELETE FROM specs WHERE product_id = ? AND category_code = ?');

    for (const code of new Set(codes.values())) {
      remove.run(productId, code);
    }

    insertSpecs(db, productId, specs, codes);
    touchProduct(db, productId);
    return specs.length;
  });
}

function resolveCategoryCodes(
  db: Database.Database,
  specs: readonly SpecRecord[],
  domainTag: string
): Map<string, number> {
  const codes = new Map<string, number>();
  for (const spec of specs) {
    if (!codes.has(spec.category)) {
      codes.set(spec.category, getOrCreateCategoryRow(db, spec.category, domainTag).code);
    }
  }
  return codes;
}

function insertSpecs(
  db: Database.Database,
  productId: number,
  specs: readonly SpecRecord[],
  codes: Map<string, number>
): void {
  const timestamp = now();
  const insert = db.prepare(`
    INSERT INTO specs (product_id, category_code, name, value, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  for (const spec of specs) {
    const code = codes.get(spec.category);
    if (code === undefined) {
      throw new Error(`Unresolved spec category "${spec.category}"`);
    }
    insert.run(productId, code, spec.name, spec.value, timestamp, timestamp);
  }
}

/**
 * Get a product's specs with their category names
 */
export function getSpecs(productId: number, domainTag: string): Array<Spec & { category: string }> {
  const db = getDatabase();
  const rows = db
    .prepare(
      `
    SELECT s.*, c.name AS category_name
    FROM specs s
    LEFT JOIN spec_categories c ON c.code = s.category_code AND c.domain_tag = ?
    WHERE s.product_id = ?
    ORDER BY s.id
  `
    )
    .all(domainTag, productId) as Array<SpecRow & { category_name: string | null }>;

  return rows.map((row) => ({ ...mapSpecRow(row), category: row.category_name ?? '' }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbStats {
  totalProducts: number;
  totalSpecs: number;
  totalReviews: number;
  reviewsWithUrl: number;
  lastUpdatedAt: Date | null;
}

/**
 * Get database statistics
 */
export function getStats(): DbStats {
  const db = getDatabase();

  const count = (sql: string): number => (db.prepare(sql).get() as { count: number }).count;

  const lastRow = db.prepare('SELECT MAX(updated_at) AS last FROM products').get() as {
    last: string | null;
  };

  return {
    totalProducts: count('SELECT COUNT(*) AS count FROM products'),
    totalSpecs: count('SELECT COUNT(*) AS count FROM specs'),
    totalReviews: count('SELECT COUNT(*) AS count FROM reviews'),
    reviewsWithUrl: count(
      "SELECT COUNT(*) AS count FROM reviews WHERE main_url IS NOT NULL AND main_url <> ''"
    ),
    lastUpdatedAt: lastRow.last ? new Date(lastRow.last) : null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// Row types for database results
interface ProductRefRow {
  id: number;
  name: string;
}

interface ProductRow {
  id: number;
  name: string;
  vendor: string;
  description: string | null;
  image_url: string | null;
  status: ProductStatus;
  created_at: string;
  updated_at: string;
}

interface CategoryRow {
  id: number;
  domain_tag: string;
  code: number;
  name: string;
}

interface SpecRow {
  id: number;
  product_id: number;
  category_code: number;
  name: string;
  value: string;
  created_at: string;
  updated_at: string;
}

// Mappers
function mapProductRow(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    vendor: row.vendor,
    description: row.description,
    imageUrl: row.image_url,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapCategoryRow(row: CategoryRow): SpecCategory {
  return {
    id: row.id,
    domainTag: row.domain_tag,
    code: row.code,
    name: row.name,
  };
}

function mapSpecRow(row: SpecRow): Spec {
  return {
    id: row.id,
    productId: row.product_id,
    categoryCode: row.category_code,
    name: row.name,
    value: row.value,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
