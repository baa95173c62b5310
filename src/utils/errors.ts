/**
 * Harvest error taxonomy
 *
 * None of these abort a run on their own: fetch and extraction failures skip
 * one unit of work, storage failures roll back one unit, and a concurrent
 * start request is answered to the caller.
 */

export type HarvestErrorCode =
  | 'TRANSIENT_FETCH'
  | 'FETCH_EXHAUSTED'
  | 'EXTRACTION'
  | 'STORAGE'
  | 'CONCURRENT_RUN_REJECTED';

export abstract class HarvestError extends Error {
  abstract readonly code: HarvestErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network error, timeout or non-2xx response for one attempt
 */
export class TransientFetchError extends HarvestError {
  readonly code = 'TRANSIENT_FETCH' as const;

  constructor(
    readonly url: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Every slot of the retry table was used for this URL
 */
export class FetchExhaustedError extends HarvestError {
  readonly code = 'FETCH_EXHAUSTED' as const;

  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly lastError: TransientFetchError
  ) {
    super(`Giving up on ${url} after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
  }
}

/**
 * The page normalizer returned nothing usable
 */
export class ExtractionError extends HarvestError {
  readonly code = 'EXTRACTION' as const;

  constructor(
    readonly url: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * A transactional write failed and was rolled back
 */
export class StorageError extends HarvestError {
  readonly code = 'STORAGE' as const;

  constructor(
    readonly unit: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConcurrentRunRejectedError extends HarvestError {
  readonly code = 'CONCURRENT_RUN_REJECTED' as const;

  constructor(readonly activeMode: string) {
    super(`A ${activeMode} run is already in progress`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
