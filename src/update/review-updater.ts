/**
 * Review Reconciliation
 *
 * Brings stored reviews back in line with the source site. Both modes run
 * the same phases:
 *
 *   1. Discovery        catalog -> known products -> board review links
 *   2. Sub-pages        main review page -> drop-down -> page URL per review
 *   3. Evaluate/update  rewrite review body, data and board specs
 *
 * A full update rewrites every review and refreshes known products' specs on
 * the way. An incremental update only rewrites reviews whose page was posted
 * after the stored update date. Pages are read through a run-wide cache so no
 * page is downloaded twice across phases.
 */

import { findProductByNameFragment } from '../db/queries.js';
import { listReviewTargets, listReviewsForProduct, type ReviewTarget } from '../db/review-queries.js';
import { ProductNameCache } from '../crawler/product-name-cache.js';
import { PageCache } from '../scraper/page-cache.js';
import {
  parseBoardsSection,
  parseProductDetail,
  parseProductList,
  parseReviewContent,
  parseReviewOptions,
  parseReviewPostedDate,
} from '../scraper/parser.js';
import { ExtractionError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { needsUpdate, toDateKey } from './decision.js';
import { ReviewOptionMatcher } from './review-matcher.js';
import type { PageSource } from '../scraper/types.js';
import type { RunState } from '../state/run-state.js';
import type { StorageManager } from '../storage/storage-manager.js';

export type UpdateMode = 'full' | 'incremental';

export interface ReviewUpdaterOptions {
  source: PageSource;
  storage: StorageManager;
  state: RunState;
  baseUrl: string;
  catalogPath: string;
  /** Zone whose calendar days stored update times are compared in */
  timeZone?: string;
  matcher?: ReviewOptionMatcher;
  cache?: PageCache;
  logger?: Logger;
}

const PROGRESS = {
  discovery: 10,
  subPages: 20,
  updateStart: 30,
  updateEnd: 85,
  done: 100,
} as const;

/** Most update pages come from the cache, so the pause after a fetch is halved */
const UPDATE_DELAY_SCALE = 0.5;

export class ReviewUpdater {
  private readonly source: PageSource;
  private readonly storage: StorageManager;
  private readonly state: RunState;
  private readonly baseUrl: string;
  private readonly catalogPath: string;
  private readonly timeZone: string;
  private readonly matcher: ReviewOptionMatcher;
  private readonly cache: PageCache;
  private readonly logger: Logger;

  constructor(options: ReviewUpdaterOptions) {
    this.source = options.source;
    this.storage = options.storage;
    this.state = options.state;
    this.baseUrl = options.baseUrl;
    this.catalogPath = options.catalogPath;
    this.timeZone = options.timeZone ?? 'UTC';
    this.matcher = options.matcher ?? new ReviewOptionMatcher();
    this.cache = options.cache ?? new PageCache();
    this.logger = options.logger ?? componentLogger('review-updater');
  }

  /**
   * Rewrite every known review. Returns the number of reviews written.
   */
  async fullUpdate(): Promise<number> {
    this.logger.info('Starting full review update');

    this.phase('Discovering review links', PROGRESS.discovery);
    await this.discover('full');

    this.phase('Resolving review sub-pages', PROGRESS.subPages);
    await this.resolveSubPages(true);

    this.phase('Updating reviews', PROGRESS.updateStart);
    const targets = listReviewTargets();
    const written = await this.updateAll(targets, true);

    this.phase('Full update complete', PROGRESS.done);
    this.logger.info({ written, reviews: targets.length }, 'Full review update finished');
    return written;
  }

  /**
   * Rewrite only reviews posted after their last stored update. Returns the
   * number of reviews written.
   */
  async incrementalUpdate(): Promise<number> {
    this.logger.info('Starting incremental review update');

    this.phase('Discovering review links', PROGRESS.discovery);
    await this.discover('incremental');

    this.phase('Resolving review sub-pages', PROGRESS.subPages);
    await this.resolveSubPages(false);

    this.phase('Checking review dates', PROGRESS.updateStart);
    const stale = await this.findStale(listReviewTargets());
    this.logger.info({ stale: stale.length }, 'Reviews needing an update');

    this.phase('Updating reviews', PROGRESS.updateStart);
    const written = await this.updateAll(stale, false);

    this.phase('Incremental update complete', PROGRESS.done);
    this.logger.info({ written, stale: stale.length }, 'Incremental review update finished');
    return written;
  }

  /**
   * Walk the catalog and write each known board's review link onto its
   * stored reviews. A full update also refreshes each known product's specs.
   */
  async discover(mode: UpdateMode): Promise<number> {
    const catalog = await this.load(this.catalogPath);
    if (catalog === null) {
      this.logger.error('Catalog listing unavailable, keeping stored review links');
      return 0;
    }

    const nameCache = ProductNameCache.fromStore();
    let links = 0;

    for (const listing of parseProductList(catalog)) {
      const productId = nameCache.lookup(listing.name);
      if (productId === undefined) {
        continue;
      }

      const page = await this.load(listing.url);
      if (page === null) {
        continue;
      }

      if (mode === 'full') {
        const detail = parseProductDetail(page, this.baseUrl);
        if (detail) {
          this.storage.storeProduct({ ...detail.attributes, name: listing.name }, detail.specs);
        } else {
          this.extractionFailed(new ExtractionError(listing.url, `No product found on page for ${listing.name}`));
        }
      }

      for (const board of parseBoardsSection(page)) {
        if (board.reviewUrl && this.recordReviewLink(board.name, board.reviewUrl)) {
          links += 1;
        }
      }
    }

    this.logger.info({ links }, 'Review link discovery finished');
    return links;
  }

  /**
   * Board names vary between pages, so the board is found by name containment
   */
  private recordReviewLink(boardName: string, reviewUrl: string): boolean {
    const board = findProductByNameFragment(boardName);
    if (!board) {
      this.logger.warn({ board: boardName }, 'No stored board matches review link');
      return false;
    }

    const reviews = listReviewsForProduct(board.id);
    if (reviews.length === 0) {
      this.logger.warn({ board: board.name }, 'Board has no stored reviews');
      return false;
    }

    for (const review of reviews) {
      const result = this.storage.recordMainUrl(review.id, reviewUrl);
      if (result.ok && result.value) {
        this.logger.info({ reviewId: review.id, board: board.name }, 'Review link updated');
      }
    }
    return true;
  }

  /**
   * Resolve each review's sub-page from its main page drop-down. Main pages
   * shared by several reviews are fetched once.
   */
  async resolveSubPages(prefetch: boolean): Promise<number> {
    const byMainUrl = new Map<string, ReviewTarget[]>();
    for (const target of listReviewTargets()) {
      const group = byMainUrl.get(target.mainUrl) ?? [];
      group.push(target);
      byMainUrl.set(target.mainUrl, group);
    }

    let resolved = 0;
    for (const [mainUrl, targets] of byMainUrl) {
      const page = await this.load(mainUrl);
      if (page === null) {
        continue;
      }

      const options = parseReviewOptions(page);
      for (const target of targets) {
        const option = this.matcher.match(target.type, options);
        if (!option) {
          this.logger.warn({ reviewId: target.reviewId, type: target.type }, 'No sub-page matches review type');
          continue;
        }

        const result = this.storage.recordPageUrl(target.reviewId, option.value);
        if (!result.ok) {
          continue;
        }
        resolved += 1;

        if (prefetch) {
          await this.load(option.value);
        }
      }
    }

    this.logger.info({ mainPages: byMainUrl.size, resolved, cached: this.cache.size }, 'Sub-pages resolved');
    return resolved;
  }

  private async findStale(targets: readonly ReviewTarget[]): Promise<ReviewTarget[]> {
    const stale: ReviewTarget[] = [];

    for (const target of targets) {
      const page = await this.load(target.mainUrl);
      if (page === null) {
        continue;
      }

      const posted = parseReviewPostedDate(page);
      if (!posted) {
        this.logger.warn({ reviewId: target.reviewId, url: target.mainUrl }, 'Review has no posted date');
        continue;
      }

      if (needsUpdate(target.updatedAt, posted, this.timeZone)) {
        this.logger.info(
          {
            reviewId: target.reviewId,
            product: target.productName,
            stored: target.updatedAt ? toDateKey(target.updatedAt, this.timeZone) : null,
            posted,
          },
          'Review needs update'
        );
        stale.push(target);
      }
    }

    return stale;
  }

  private async updateAll(targets: readonly ReviewTarget[], force: boolean): Promise<number> {
    const span = PROGRESS.updateEnd - PROGRESS.updateStart;
    let written = 0;

    for (const [index, target] of targets.entries()) {
      this.state.setProgress(PROGRESS.updateStart + Math.floor(span * (index / targets.length)));
      if (await this.updateReview(target, force)) {
        written += 1;
      }
    }

    return written;
  }

  /**
   * Re-read one review (sub-page preferred) and rewrite its content
   */
  private async updateReview(target: ReviewTarget, force: boolean): Promise<boolean> {
    const url = target.pageUrl ?? target.mainUrl;
    const page = await this.load(url, UPDATE_DELAY_SCALE);
    if (page === null) {
      return false;
    }

    const content = parseReviewContent(page, target.type);
    if (!content) {
      this.extractionFailed(new ExtractionError(url, `No review content for review ${target.reviewId}`));
      return false;
    }

    const result = this.storage.refreshReview(target.reviewId, content.body, content.data, force);
    if (!result.ok || !result.value.written) {
      return false;
    }

    if (content.specs.length > 0) {
      this.storage.replaceProductSpecs(target.productId, content.specs);
    }

    this.state.addUpdatedReview();
    this.logger.info(
      { reviewId: target.reviewId, changed: result.value.changed, data: content.data.length },
      'Review updated'
    );
    return true;
  }

  /**
   * Page body from the run cache, or from the source bypassing the dedup set
   */
  private async load(url: string, delayScale?: number): Promise<string | null> {
    const cached = this.cache.get(url);
    if (cached !== undefined) {
      return cached;
    }

    const outcome = await this.source.fetch(url, { relative: true, bypassDedup: true, delayScale });
    if (outcome.status === 'ok') {
      this.cache.set(url, outcome.body);
      return outcome.body;
    }

    if (outcome.status === 'failed') {
      this.state.addError();
      this.logger.warn({ url, error: outcome.error.message }, 'Page unavailable');
    }
    return null;
  }

  private phase(task: string, progress: number): void {
    this.state.setTask(task);
    this.state.setProgress(progress);
  }

  private extractionFailed(error: ExtractionError): void {
    this.state.addError();
    this.logger.warn({ url: error.url, error: error.message }, 'Nothing usable extracted');
  }
}
