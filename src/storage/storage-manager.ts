/**
 * Storage Manager
 *
 * Unit-of-work writes against the store. Every write either commits as a
 * whole or is rolled back and reported as a StorageError value, so a bad unit
 * never stops the run.
 */

import {
  replaceSpecCategories,
  upsertProductWithSpecs,
  type ProductWriteResult,
} from '../db/queries.js';
import {
  refreshReviewContent,
  setReviewMainUrl,
  setReviewPageUrl,
  upsertReviewWithData,
} from '../db/review-queries.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import type { RunState } from '../state/run-state.js';
import type { ProductAttributes, ReviewDatumRecord, SpecRecord } from '../types/index.js';

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StorageError };

export const RELATION_CATEGORY = 'Relations';
export const PARENT_SPEC_NAME = 'Parent GPU ID';

export interface ReviewContentInput {
  type: string;
  title: string;
  body: string;
  data: readonly ReviewDatumRecord[];
  mainUrl?: string | null;
  pageUrl?: string | null;
}

export class StorageManager {
  private readonly logger: Logger;

  constructor(
    private readonly state: RunState,
    private readonly domainTag: string,
    logger: Logger = componentLogger('storage')
  ) {
    this.logger = logger;
  }

  /**
   * Upsert a product and replace its spec set
   */
  storeProduct(
    attrs: ProductAttributes,
    specs: readonly SpecRecord[]
  ): StoreResult<ProductWriteResult> {
    const result = this.attempt(`product:${attrs.name}`, () =>
      upsertProductWithSpecs(attrs, specs, this.domainTag)
    );

    if (result.ok) {
      this.state.addProduct(result.value.productId);
      this.state.addSpecs(result.value.specCount);
      this.logger.info(
        {
          product: attrs.name,
          productId: result.value.productId,
          created: result.value.created,
          specs: result.value.specCount,
        },
        'Product stored'
      );
    }

    return result;
  }

  /**
   * Store a board as its own product, linked to its GPU through a spec
   */
  storeBoard(
    parentId: number,
    attrs: ProductAttributes,
    specs: readonly SpecRecord[]
  ): StoreResult<ProductWriteResult> {
    const relation: SpecRecord = {
      category: RELATION_CATEGORY,
      name: PARENT_SPEC_NAME,
      value: String(parentId),
    };
    return this.storeProduct(attrs, [...specs, relation]);
  }

  /**
   * Upsert one review of a board and replace its structured data
   */
  storeReview(boardId: number, content: ReviewContentInput): StoreResult<number> {
    const result = this.attempt(`review:${boardId}:${content.type}`, () => {
      const { reviewId } = upsertReviewWithData(
        {
          masterProductId: boardId,
          type: content.type,
          title: content.title,
          body: content.body,
          mainUrl: content.mainUrl,
          pageUrl: content.pageUrl,
        },
        content.data
      );
      return reviewId;
    });

    if (result.ok) {
      this.state.addReview();
      this.logger.info(
        { boardId, reviewId: result.value, type: content.type, data: content.data.length },
        'Review stored'
      );
    }

    return result;
  }

  /**
   * Rewrite an existing review's body and data
   */
  refreshReview(
    reviewId: number,
    body: string,
    data: readonly ReviewDatumRecord[],
    force: boolean
  ): StoreResult<{ changed: boolean; written: boolean }> {
    return this.attempt(`review:${reviewId}`, () => refreshReviewContent(reviewId, body, data, force));
  }

  /**
   * Replace the spec categories a review page reports for a product
   */
  replaceProductSpecs(productId: number, specs: readonly SpecRecord[]): StoreResult<number> {
    const result = this.attempt(`specs:${productId}`, () =>
      replaceSpecCategories(productId, specs, this.domainTag)
    );
    if (result.ok) {
      this.state.addSpecs(result.value);
    }
    return result;
  }

  recordMainUrl(reviewId: number, mainUrl: string): StoreResult<boolean> {
    return this.attempt(`review-url:${reviewId}`, () => setReviewMainUrl(reviewId, mainUrl));
  }

  recordPageUrl(reviewId: number, pageUrl: string): StoreResult<void> {
    return this.attempt(`review-page:${reviewId}`, () => setReviewPageUrl(reviewId, pageUrl));
  }

  private attempt<T>(unit: string, fn: () => T): StoreResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (error) {
      const storageError = new StorageError(unit, `Storage write failed for ${unit}: ${errorMessage(error)}`, {
        cause: error,
      });
      this.state.addError();
      this.logger.error({ unit, error: storageError.message }, 'Storage write rolled back');
      return { ok: false, error: storageError };
    }
  }
}
