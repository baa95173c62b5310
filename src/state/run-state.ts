/**
 * Live counters and progress of one run
 */

import type { RunCounters } from '../types/index.js';

export interface RunProgress extends RunCounters {
  task: string;
  progress: number;
  elapsedSeconds: number;
}

export class RunState {
  private readonly startedAt: number;
  private readonly productIds = new Set<number>();
  private specs = 0;
  private reviews = 0;
  private updatedReviews = 0;
  private errors = 0;
  private task = '';
  private progress = 0;

  constructor(now: number = Date.now()) {
    this.startedAt = now;
  }

  addProduct(productId: number): void {
    this.productIds.add(productId);
  }

  addSpecs(count: number): void {
    this.specs += count;
  }

  addReview(): void {
    this.reviews += 1;
  }

  addUpdatedReview(): void {
    this.updatedReviews += 1;
  }

  addError(): void {
    this.errors += 1;
  }

  setTask(task: string): void {
    this.task = task;
  }

  /**
   * Progress in percent, clamped to 0..100
   */
  setProgress(percent: number): void {
    this.progress = Math.max(0, Math.min(100, Math.round(percent)));
  }

  getCounters(): RunCounters {
    return {
      products: this.productIds.size,
      specs: this.specs,
      reviews: this.reviews,
      updatedReviews: this.updatedReviews,
      errors: this.errors,
    };
  }

  snapshot(now: number = Date.now()): RunProgress {
    return {
      ...this.getCounters(),
      task: this.task,
      progress: this.progress,
      elapsedSeconds: Math.round((now - this.startedAt) / 10) / 100,
    };
  }
}
