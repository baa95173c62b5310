/**
 * Harvest job
 *
 * Builds the collaborators for one run and dispatches on its mode:
 *   default      catalog crawl (optionally one GPU)
 *   full         rewrite every stored review
 *   incremental  rewrite reviews posted since their last update
 *
 * The fetcher (and with it the dedup set) lives for exactly one run.
 */

import { CatalogCrawler } from './crawler/catalog-crawler.js';
import { getStats } from './db/queries.js';
import { RateLimitedFetcher, type HttpGet } from './scraper/fetcher.js';
import { StorageManager } from './storage/storage-manager.js';
import { ReviewUpdater } from './update/review-updater.js';
import { config } from './config/index.js';
import { componentLogger } from './utils/logger.js';
import type { HarvestJob } from './state/run-supervisor.js';
import type { PageSource } from './scraper/types.js';

const logger = componentLogger('pipeline');

export interface HarvestJobOptions {
  /** Replaces the network fetcher, mainly for tests */
  createSource?: () => PageSource;
  httpGet?: HttpGet;
}

export function createHarvestJob(options: HarvestJobOptions = {}): HarvestJob {
  const createSource =
    options.createSource ??
    (() =>
      new RateLimitedFetcher({
        baseUrl: config.source.baseUrl,
        timeoutMs: config.fetch.timeoutMs,
        minDelayMs: config.fetch.minDelayMs,
        maxDelayMs: config.fetch.maxDelayMs,
        retryDelaysMs: config.fetch.retryDelaysMs,
        httpGet: options.httpGet,
      }));

  return async (request, state) => {
    const source = createSource();
    const storage = new StorageManager(state, config.database.specDomainTag);
    const shared = {
      source,
      storage,
      state,
      baseUrl: config.source.baseUrl,
      catalogPath: config.source.catalogPath,
    };
    const updaterOptions = { ...shared, timeZone: config.scheduler.timezone };

    switch (request.mode) {
      case 'default': {
        const crawler = new CatalogCrawler({
          ...shared,
          productWorkers: config.workers.product,
          boardWorkers: config.workers.board,
        });
        const result = await crawler.run({ gpuName: request.gpuName });
        logger.info({ ...result }, 'Catalog crawl complete');
        break;
      }
      case 'full': {
        const written = await new ReviewUpdater(updaterOptions).fullUpdate();
        logger.info({ written }, 'Full update complete');
        break;
      }
      case 'incremental': {
        const written = await new ReviewUpdater(updaterOptions).incrementalUpdate();
        logger.info({ written }, 'Incremental update complete');
        break;
      }
    }

    logger.info({ store: getStats() }, 'Store totals');
  };
}
