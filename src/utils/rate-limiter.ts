/**
 * Human-like pause between successful requests
 */

import { randomDelay, sleep } from './retry.js';

export interface PolitenessOptions {
  minDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class PolitenessDelay {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: PolitenessOptions) {
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Pick the next delay without waiting
   */
  next(scale = 1): number {
    return randomDelay(this.minDelayMs, this.maxDelayMs, this.random) * scale;
  }

  /**
   * Wait a randomized delay and return how long was waited
   */
  async wait(scale = 1): Promise<number> {
    const delay = this.next(scale);
    await this.sleepFn(delay);
    return delay;
  }
}
