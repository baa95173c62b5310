/**
 * Catalog Crawler
 *
 * Default run mode: walks the catalog listing, stores every new GPU with its
 * specs and boards, then stores each board's reviews.
 *
 * Two queues feed two worker pools. Board/review tasks are only discovered
 * while product tasks are processed, so the product queue is joined first
 * and the board queue after it.
 */

import { TaskQueue } from '../queue/task-queue.js';
import { WorkerPool } from '../queue/worker-pool.js';
import {
  boardRowSpecs,
  describeSpecs,
  extractVendor,
  parseBoardsSection,
  parseProductDetail,
  parseProductList,
  parseReviewContent,
  parseReviewOptions,
} from '../scraper/parser.js';
import { ExtractionError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { ProductNameCache } from './product-name-cache.js';
import type { RunState } from '../state/run-state.js';
import type { StorageManager } from '../storage/storage-manager.js';
import type { BoardListing, FetchOutcome, PageSource, ProductListing } from '../scraper/types.js';
import type { ProductAttributes, SpecRecord } from '../types/index.js';

export interface CatalogCrawlerOptions {
  source: PageSource;
  storage: StorageManager;
  state: RunState;
  baseUrl: string;
  catalogPath: string;
  productWorkers: number;
  boardWorkers: number;
  logger?: Logger;
}

export interface ProductTask {
  listing: ProductListing;
}

export interface BoardReviewTask {
  productId: number;
  boardId: number;
  boardName: string;
  reviewUrl: string;
}

export interface CrawlResult {
  listed: number;
  queued: number;
  boardTasks: number;
}

export class CatalogCrawler {
  private readonly source: PageSource;
  private readonly storage: StorageManager;
  private readonly state: RunState;
  private readonly baseUrl: string;
  private readonly catalogPath: string;
  private readonly productWorkers: number;
  private readonly boardWorkers: number;
  private readonly logger: Logger;

  constructor(options: CatalogCrawlerOptions) {
    this.source = options.source;
    this.storage = options.storage;
    this.state = options.state;
    this.baseUrl = options.baseUrl;
    this.catalogPath = options.catalogPath;
    this.productWorkers = options.productWorkers;
    this.boardWorkers = options.boardWorkers;
    this.logger = options.logger ?? componentLogger('crawler');
  }

  /**
   * Crawl the whole catalog, or only the GPU whose name matches `gpuName`
   */
  async run(options: { gpuName?: string } = {}): Promise<CrawlResult> {
    this.state.setTask('Fetching catalog listing');
    const catalog = await this.source.fetch(this.catalogPath, { relative: true });
    if (catalog.status === 'failed') {
      throw catalog.error;
    }
    if (catalog.status === 'duplicate') {
      throw new ExtractionError(catalog.url, 'Catalog listing was already fetched in this run');
    }

    const listing = parseProductList(catalog.body);
    if (listing.length === 0) {
      throw new ExtractionError(catalog.url, 'Catalog listing contains no products');
    }

    const selected = options.gpuName ? this.select(listing, options.gpuName) : listing;
    if (selected.length === 0) {
      this.state.setProgress(100);
      return { listed: listing.length, queued: 0, boardTasks: 0 };
    }

    const nameCache = ProductNameCache.fromStore();
    this.logger.info({ known: nameCache.size, queued: selected.length }, 'Product name cache ready');

    const productQueue = new TaskQueue<ProductTask>('products');
    const boardQueue = new TaskQueue<BoardReviewTask>('boards');
    let completed = 0;

    const productPool = new WorkerPool<ProductTask>({
      queue: productQueue,
      size: this.productWorkers,
      describe: (task) => task.listing.name,
      handler: async (task) => {
        try {
          await this.processProduct(task, nameCache, boardQueue);
        } finally {
          completed += 1;
          this.state.setProgress((completed / selected.length) * 90);
        }
      },
    });
    const boardPool = new WorkerPool<BoardReviewTask>({
      queue: boardQueue,
      size: this.boardWorkers,
      describe: (task) => task.boardName,
      handler: (task) => this.processBoardReviews(task),
    });

    productPool.start();
    boardPool.start();

    for (const product of selected) {
      productQueue.put({ listing: product });
    }

    this.state.setTask('Processing products');
    await productQueue.join();
    const boardTasks = boardQueue.stats().totalEnqueued;
    this.logger.info({ boardTasks }, 'Product queue drained');

    this.state.setTask('Processing board reviews');
    await boardQueue.join();

    await Promise.all([productPool.stop(), boardPool.stop()]);
    this.state.setProgress(100);

    return { listed: listing.length, queued: selected.length, boardTasks };
  }

  private select(listing: readonly ProductListing[], gpuName: string): ProductListing[] {
    const wanted = gpuName.trim().toLowerCase();
    const exact = listing.filter((product) => product.name.toLowerCase() === wanted);

    if (exact.length === 0) {
      const candidates = listing
        .filter((product) => product.name.toLowerCase().includes(wanted))
        .map((product) => product.name);
      this.logger.warn({ gpuName, candidates }, 'No GPU matches the requested name');
    }

    return exact;
  }

  private async processProduct(
    task: ProductTask,
    nameCache: ProductNameCache,
    boardQueue: TaskQueue<BoardReviewTask>
  ): Promise<void> {
    const { listing } = task;
    const knownId = nameCache.lookup(listing.name);
    if (knownId !== undefined) {
      this.logger.info({ product: listing.name, productId: knownId }, 'Product already stored, skipping');
      return;
    }

    this.state.setTask(`Processing ${listing.name}`);
    const page = await this.source.fetch(listing.url, { relative: true });
    const body = this.bodyOf(page, listing.name);
    if (body === null) {
      return;
    }

    const detail = parseProductDetail(body, this.baseUrl);
    if (!detail) {
      this.extractionFailed(new ExtractionError(listing.url, `No product found on page for ${listing.name}`));
      return;
    }

    const stored = this.storage.storeProduct(detail.attributes, detail.specs);
    if (!stored.ok) {
      return;
    }

    const productId = stored.value.productId;
    nameCache.add(listing.name, productId);
    nameCache.add(detail.attributes.name, productId);

    for (const board of parseBoardsSection(body)) {
      const boardId = await this.storeBoard(productId, board);
      if (boardId !== null && board.reviewUrl) {
        boardQueue.put({ productId, boardId, boardName: board.name, reviewUrl: board.reviewUrl });
        this.logger.debug({ board: board.name }, 'Board review queued');
      }
    }
  }

  /**
   * Store one board as a product linked to its GPU, preferring its own page
   */
  private async storeBoard(parentId: number, board: BoardListing): Promise<number | null> {
    let attributes: ProductAttributes = {
      name: board.name,
      vendor: extractVendor(board.name),
    };
    let specs: SpecRecord[] = boardRowSpecs(board);

    if (board.url) {
      const page = await this.source.fetch(board.url, { relative: true });
      const body = this.bodyOf(page, board.name);
      const detail = body === null ? null : parseProductDetail(body, this.baseUrl);
      if (detail) {
        attributes = detail.attributes;
        specs = detail.specs;
      }
    }

    const description = describeSpecs(specs);
    const stored = this.storage.storeBoard(
      parentId,
      { ...attributes, description: description || attributes.description },
      specs
    );
    return stored.ok ? stored.value.productId : null;
  }

  private async processBoardReviews(task: BoardReviewTask): Promise<void> {
    const main = await this.source.fetch(task.reviewUrl, { relative: true });
    const mainBody = this.bodyOf(main, task.boardName);
    if (mainBody === null) {
      return;
    }

    const options = parseReviewOptions(mainBody);
    if (options.length === 0) {
      this.logger.warn({ board: task.boardName, url: task.reviewUrl }, 'Review has no recognized sub-pages');
      return;
    }

    for (const option of options) {
      const page = await this.source.fetch(option.value, { relative: true });
      const body = this.bodyOf(page, `${task.boardName} / ${option.text}`);
      if (body === null) {
        continue;
      }

      const content = parseReviewContent(body, option.text);
      if (!content) {
        this.extractionFailed(new ExtractionError(option.value, `Empty review page "${option.text}"`));
        continue;
      }

      const stored = this.storage.storeReview(task.boardId, {
        type: option.text,
        title: content.title,
        body: content.body,
        data: content.data,
        mainUrl: task.reviewUrl,
        pageUrl: option.value,
      });

      if (stored.ok && content.specs.length > 0) {
        this.storage.replaceProductSpecs(task.boardId, content.specs);
      }
    }
  }

  private bodyOf(outcome: FetchOutcome, unit: string): string | null {
    switch (outcome.status) {
      case 'ok':
        return outcome.body;
      case 'duplicate':
        this.logger.debug({ unit, url: outcome.url }, 'Page already fetched in this run');
        return null;
      case 'failed':
        this.state.addError();
        this.logger.warn({ unit, url: outcome.error.url, error: outcome.error.message }, 'Skipping unit');
        return null;
    }
  }

  private extractionFailed(error: ExtractionError): void {
    this.state.addError();
    this.logger.warn({ url: error.url, error: error.message }, 'Nothing usable extracted');
  }
}
