/**
 * Tiered retry schedule and sleep helpers
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fixed, ordered table of retry delays. The attempt index selects the delay
 * directly; once the index runs past the table the operation is abandoned.
 */
export class RetryTable {
  private readonly delaysMs: readonly number[];

  constructor(delaysMs: readonly number[]) {
    this.delaysMs = [...delaysMs];
  }

  get length(): number {
    return this.delaysMs.length;
  }

  /**
   * Delay before retrying after the given failed attempt, or null when exhausted
   */
  delayFor(attempt: number): number | null {
    if (attempt < 0 || attempt >= this.delaysMs.length) {
      return null;
    }
    return this.delaysMs[attempt] ?? null;
  }
}

/**
 * Uniform random delay between min and max (inclusive of min)
 */
export function randomDelay(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random
): number {
  return minMs + (maxMs - minMs) * random();
}
