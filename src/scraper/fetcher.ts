/**
 * Rate-Limited Fetcher
 *
 * Plain HTTP GETs against the catalog site with randomized headers, a fixed
 * per-attempt timeout, a politeness pause after every success and a tiered
 * retry table sized for day-long source-side blocking.
 */

import { FetchExhaustedError, TransientFetchError, errorMessage } from '../utils/errors.js';
import { PolitenessDelay } from '../utils/rate-limiter.js';
import { RetryTable, sleep as defaultSleep } from '../utils/retry.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { buildHeaders } from './headers.js';
import type { FetchOptions, FetchOutcome, PageSource } from './types.js';

export interface HttpRequest {
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * Issue one GET and return the body; throws TransientFetchError on any failure
 */
export type HttpGet = (url: string, request: HttpRequest) => Promise<string>;

export interface RateLimitedFetcherOptions {
  baseUrl: string;
  timeoutMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  retryDelaysMs: readonly number[];
  httpGet?: HttpGet;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

/**
 * GET through native fetch, mapping network errors, timeouts and non-2xx
 * answers to TransientFetchError
 */
export const nativeHttpGet: HttpGet = async (url, request) => {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: request.headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    const message = timedOut
      ? `Request timed out after ${request.timeoutMs}ms`
      : `Network error: ${errorMessage(error)}`;
    throw new TransientFetchError(url, message, undefined, { cause: error });
  }

  if (!response.ok) {
    throw new TransientFetchError(url, `HTTP ${response.status}: ${response.statusText}`, response.status);
  }

  return response.text();
};

export class RateLimitedFetcher implements PageSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryTable: RetryTable;
  private readonly politeness: PolitenessDelay;
  private readonly httpGet: HttpGet;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly processed = new Set<string>();
  private readonly inFlight = new Set<string>();

  constructor(options: RateLimitedFetcherOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.retryTable = new RetryTable(options.retryDelaysMs);
    this.httpGet = options.httpGet ?? nativeHttpGet;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.politeness = new PolitenessDelay({
      minDelayMs: options.minDelayMs,
      maxDelayMs: options.maxDelayMs,
      sleep: this.sleep,
      random: this.random,
    });
    this.logger = options.logger ?? componentLogger('fetcher');
  }

  /**
   * Resolve a site-relative link against the base URL
   */
  resolve(url: string): string {
    return new URL(url, this.baseUrl).toString();
  }

  hasProcessed(url: string): boolean {
    return this.processed.has(url);
  }

  get processedCount(): number {
    return this.processed.size;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const target = options.relative ? this.resolve(url) : url;

    if (options.bypassDedup) {
      return this.download(target, options);
    }

    // a URL counts as taken from the moment its first request starts
    if (this.processed.has(target) || this.inFlight.has(target)) {
      this.logger.debug({ url: target }, 'Skipping already processed URL');
      return { status: 'duplicate', url: target };
    }

    this.inFlight.add(target);
    try {
      return await this.download(target, options);
    } finally {
      this.inFlight.delete(target);
    }
  }

  private async download(target: string, options: FetchOptions): Promise<FetchOutcome> {
    for (let attempt = 0; ; attempt++) {
      let body: string;

      try {
        this.logger.info({ url: target, attempt: attempt + 1 }, 'Requesting page');
        body = await this.httpGet(target, {
          headers: buildHeaders(this.baseUrl, this.random),
          timeoutMs: this.timeoutMs,
        });
      } catch (error) {
        const transient =
          error instanceof TransientFetchError
            ? error
            : new TransientFetchError(target, errorMessage(error), undefined, { cause: error });

        const delay = this.retryTable.delayFor(attempt);
        if (delay === null) {
          const exhausted = new FetchExhaustedError(target, attempt + 1, transient);
          this.logger.error({ url: target, attempts: attempt + 1, error: transient.message }, 'Fetch abandoned');
          return { status: 'failed', error: exhausted };
        }

        this.logger.warn(
          {
            url: target,
            error: transient.message,
            retryInMs: delay,
            attempt: attempt + 1,
            maxRetries: this.retryTable.length,
          },
          'Fetch failed, retrying'
        );
        await this.sleep(delay);
        continue;
      }

      const waited = await this.politeness.wait(options.delayScale);
      this.logger.debug({ url: target, waitedMs: Math.round(waited) }, 'Politeness delay done');
      this.processed.add(target);
      return { status: 'ok', body, url: target };
    }
  }
}
