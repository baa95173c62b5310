/**
 * Review Queries and Operations
 */

import type Database from 'better-sqlite3';
import { getDatabase, withTransaction } from './index.js';
import type { Review, ReviewDatum, ReviewDatumRecord } from '../types/index.js';

function now(): string {
  return new Date().toISOString();
}

export interface ReviewInput {
  masterProductId: number;
  type: string;
  title: string;
  body: string;
  mainUrl?: string | null;
  pageUrl?: string | null;
}

export interface ReviewWriteResult {
  reviewId: number;
  created: boolean;
  changed: boolean;
}

/**
 * Review due for reconciliation, joined with the product it belongs to
 */
export interface ReviewTarget {
  reviewId: number;
  type: string;
  mainUrl: string;
  pageUrl: string | null;
  productId: number;
  productName: string;
  updatedAt: Date | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Review Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert a review keyed by (product, type, title), or update the body of the
 * existing one. updated_at only moves when the body actually changes.
 */
export function upsertReview(input: ReviewInput): ReviewWriteResult {
  return withTransaction((db) => upsertReviewRow(db, input));
}

function upsertReviewRow(db: Database.Database, input: ReviewInput): ReviewWriteResult {
  const timestamp = now();
  const existing = db
    .prepare('SELECT * FROM reviews WHERE master_product_id = ? AND type = ? AND title = ?')
    .get(input.masterProductId, input.type, input.title) as ReviewRow | undefined;

  if (!existing) {
    const result = db
      .prepare(
        `
      INSERT INTO reviews (master_product_id, type, title, body, main_url, page_url, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        input.masterProductId,
        input.type,
        input.title,
        input.body,
        input.mainUrl ?? null,
        input.pageUrl ?? null,
        timestamp,
        timestamp
      );
    return { reviewId: Number(result.lastInsertRowid), created: true, changed: true };
  }

  const changed = existing.body !== input.body;

  db.prepare(
    `
    UPDATE reviews
    SET body = ?, main_url = ?, page_url = ?, updated_at = ?
    WHERE id = ?
  `
  ).run(
    input.body,
    input.mainUrl !== undefined ? input.mainUrl : existing.main_url,
    input.pageUrl !== undefined ? input.pageUrl : existing.page_url,
    changed ? timestamp : existing.updated_at,
    existing.id
  );

  return { reviewId: existing.id, created: false, changed };
}

/**
 * Upsert a review and replace its structured data in one transaction. A
 * change in either the body or the data moves updated_at.
 */
export function upsertReviewWithData(
  input: ReviewInput,
  items: readonly ReviewDatumRecord[]
): ReviewWriteResult {
  return withTransaction((db) => {
    const result = upsertReviewRow(db, input);
    const previous = listReviewDataRows(db, result.reviewId).map(mapReviewDatumRow);
    const dataChanged = !sameReviewData(previous, items);

    if (dataChanged && !result.changed) {
      db.prepare('UPDATE reviews SET updated_at = ? WHERE id = ?').run(now(), result.reviewId);
    }
    replaceReviewDataRows(db, result.reviewId, items);

    return { ...result, changed: result.changed || dataChanged };
  });
}

function replaceReviewDataRows(
  db: Database.Database,
  reviewId: number,
  items: readonly ReviewDatumRecord[]
): number {
  db.prepare('DELETE FROM review_data WHERE review_id = ?').run(reviewId);

  const insert = db.prepare(`
    INSERT INTO review_data (review_id, data_type, data_key, data_value, data_unit, product_name)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  for (const item of items) {
    insert.run(reviewId, item.dataType, item.key, item.value, item.unit, item.productName);
  }

  return items.length;
}

/**
 * Rewrite a review's body and data together. Without `force` nothing is
 * written when both match what is stored; updated_at advances only when
 * either of them differs.
 */
export function refreshReviewContent(
  reviewId: number,
  body: string,
  items: readonly ReviewDatumRecord[],
  force = false
): { changed: boolean; written: boolean } {
  return withTransaction((db) => {
    const existing = db.prepare('SELECT * FROM reviews WHERE id = ?').get(reviewId) as
      | ReviewRow
      | undefined;
    if (!existing) {
      throw new Error(`Review ${reviewId} not found`);
    }

    const previous = listReviewDataRows(db, reviewId).map(mapReviewDatumRow);
    const changed = existing.body !== body || !sameReviewData(previous, items);

    if (!changed && !force) {
      return { changed, written: false };
    }

    db.prepare('UPDATE reviews SET body = ?, updated_at = ? WHERE id = ?').run(
      body,
      changed ? now() : existing.updated_at,
      reviewId
    );
    replaceReviewDataRows(db, reviewId, items);

    return { changed, written: true };
  });
}

/**
 * Record the main review URL. Does not touch updated_at: that column tracks
 * content freshness only.
 */
export function setReviewMainUrl(reviewId: number, mainUrl: string): boolean {
  const db = getDatabase();
  const result = db
    .prepare('UPDATE reviews SET main_url = ? WHERE id = ? AND (main_url IS NULL OR main_url <> ?)')
    .run(mainUrl, reviewId, mainUrl);
  return result.changes > 0;
}

/**
 * Record the resolved sub-page URL. Does not touch updated_at.
 */
export function setReviewPageUrl(reviewId: number, pageUrl: string): void {
  const db = getDatabase();
  db.prepare('UPDATE reviews SET page_url = ? WHERE id = ?').run(pageUrl, reviewId);
}

/**
 * Get review by ID
 */
export function getReviewById(id: number): Review | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM reviews WHERE id = ?').get(id) as ReviewRow | undefined;
  return row ? mapReviewRow(row) : null;
}

/**
 * Reviews attached to one product
 */
export function listReviewsForProduct(productId: number): Review[] {
  const db = getDatabase();
  const rows = db
    .prepare('SELECT * FROM reviews WHERE master_product_id = ? ORDER BY id')
    .all(productId) as ReviewRow[];
  return rows.map(mapReviewRow);
}

/**
 * Reviews with a known main URL, with their product
 */
export function listReviewTargets(): ReviewTarget[] {
  const db = getDatabase();
  const rows = db
    .prepare(
      `
    SELECT r.id, r.type, r.main_url, r.page_url, r.updated_at, p.id AS product_id, p.name AS product_name
    FROM reviews r
    INNER JOIN products p ON p.id = r.master_product_id
    WHERE r.main_url IS NOT NULL AND r.main_url <> ''
    ORDER BY r.id
  `
    )
    .all() as ReviewTargetRow[];

  return rows.map((row) => ({
    reviewId: row.id,
    type: row.type,
    mainUrl: row.main_url,
    pageUrl: row.page_url,
    productId: row.product_id,
    productName: row.product_name,
    updatedAt: row.updated_at ? new Date(row.updated_at) : null,
  }));
}

/**
 * Structured data of one review
 */
export function getReviewData(reviewId: number): ReviewDatum[] {
  return listReviewDataRows(getDatabase(), reviewId).map(mapReviewDatumRow);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

function listReviewDataRows(db: Database.Database, reviewId: number): ReviewDatumRow[] {
  return db
    .prepare('SELECT * FROM review_data WHERE review_id = ? ORDER BY id')
    .all(reviewId) as ReviewDatumRow[];
}

function sameReviewData(
  previous: readonly ReviewDatumRecord[],
  next: readonly ReviewDatumRecord[]
): boolean {
  if (previous.length !== next.length) {
    return false;
  }
  return previous.every((item, index) => {
    const other = next[index];
    return (
      other !== undefined &&
      item.dataType === other.dataType &&
      item.key === other.key &&
      item.value === other.value &&
      item.unit === other.unit &&
      item.productName === other.productName
    );
  });
}

// Row types for database results
interface ReviewRow {
  id: number;
  master_product_id: number;
  type: string;
  title: string;
  body: string;
  main_url: string | null;
  page_url: string | null;
  created_at: string;
  updated_at: string | null;
}

interface ReviewTargetRow {
  id: number;
  type: string;
  main_url: string;
  page_url: string | null;
  updated_at: string | null;
  product_id: number;
  product_name: string;
}

interface ReviewDatumRow {
  id: number;
  review_id: number;
  data_type: string;
  data_key: string;
  data_value: string;
  data_unit: string;
  product_name: string;
}

// Mappers
function mapReviewRow(row: ReviewRow): Review {
  return {
    id: row.id,
    masterProductId: row.master_product_id,
    type: row.type,
    title: row.title,
    body: row.body,
    mainUrl: row.main_url,
    pageUrl: row.page_url,
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at ? new Date(row.updated_at) : null,
  };
}

function mapReviewDatumRow(row: ReviewDatumRow): ReviewDatum {
  return {
    id: row.id,
    reviewId: row.review_id,
    dataType: row.data_type,
    key: row.data_key,
    value: row.data_value,
    unit: row.data_unit,
    productName: row.product_name,
  };
}
