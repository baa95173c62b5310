import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PARENT_SPEC_NAME, RELATION_CATEGORY, StorageManager } from '../storage-manager.js';
import { closeDatabase, getDatabase, initDatabase } from '../../db/index.js';
import { getSpecs } from '../../db/queries.js';
import { getReviewData, listReviewsForProduct } from '../../db/review-queries.js';
import { RunState } from '../../state/run-state.js';
import { StorageError } from '../../utils/errors.js';

const TAG = 'GPU Specs';

describe('StorageManager', () => {
  let state: RunState;
  let storage: StorageManager;

  beforeEach(() => {
    initDatabase(':memory:');
    state = new RunState();
    storage = new StorageManager(state, TAG);
  });

  afterEach(() => {
    closeDatabase();
  });

  it('links a board to its GPU through a relation spec', () => {
    const gpu = storage.storeProduct({ name: 'Acme X1', vendor: 'Acme' }, []);
    expect(gpu.ok).toBe(true);
    if (!gpu.ok) {
      return;
    }

    const board = storage.storeBoard(
      gpu.value.productId,
      { name: 'Vendor X1 OC', vendor: 'Vendor' },
      [{ category: 'Clock Speeds', name: 'Boost Clock', value: '2600 MHz' }]
    );

    expect(board).toMatchObject({ ok: true, value: { created: true, specCount: 2 } });
    if (!board.ok) {
      return;
    }
    expect(getSpecs(board.value.productId, TAG).slice(-1)).toMatchObject([
      { category: RELATION_CATEGORY, name: PARENT_SPEC_NAME, value: String(gpu.value.productId) },
    ]);
    expect(state.getCounters()).toMatchObject({ products: 2, specs: 2 });
  });

  it('stores a review with its data', () => {
    const board = storage.storeProduct({ name: 'Vendor X1 OC', vendor: 'Vendor' }, []);
    if (!board.ok) {
      throw board.error;
    }

    const review = storage.storeReview(board.value.productId, {
      type: 'Temperatures & Fan Noise',
      title: 'Temperatures',
      body: 'Idle and gaming temperatures.',
      data: [{ dataType: 'Thermal', key: 'Idle', value: '32', unit: '°C', productName: 'Vendor X1 OC' }],
      mainUrl: '/review/vendor-x1-oc/',
    });

    expect(review.ok).toBe(true);
    if (review.ok) {
      expect(getReviewData(review.value)).toHaveLength(1);
    }
    expect(state.getCounters().reviews).toBe(1);
  });

  it('rolls the review back when its data cannot be written', () => {
    const board = storage.storeProduct({ name: 'Vendor X1 OC', vendor: 'Vendor' }, []);
    if (!board.ok) {
      throw board.error;
    }
    getDatabase().exec(`
      CREATE TRIGGER reject_review_data BEFORE INSERT ON review_data
      BEGIN SELECT RAISE(ABORT, 'review data rejected'); END;
    `);

    const review = storage.storeReview(board.value.productId, {
      type: 'Temperatures & Fan Noise',
      title: 'Temperatures',
      body: 'new body',
      data: [{ dataType: 'Thermal', key: 'Idle', value: '32', unit: '°C', productName: 'Vendor X1 OC' }],
    });

    expect(review.ok).toBe(false);
    if (!review.ok) {
      expect(review.error.unit).toBe(`review:${board.value.productId}:Temperatures & Fan Noise`);
    }
    expect(listReviewsForProduct(board.value.productId)).toEqual([]);
    expect(state.getCounters()).toMatchObject({ reviews: 0, errors: 1 });
  });

  it('reports a failed write as a value and counts it', () => {
    const result = storage.refreshReview(404, 'body', [], true);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StorageError);
      expect(result.error.unit).toBe('review:404');
      expect(result.error.message).toBe('Storage write failed for review:404: Review 404 not found');
    }
    expect(state.getCounters().errors).toBe(1);
  });
});
