import { describe, expect, it } from 'vitest';
import { formatRunSummary, sendRunSummary } from '../email.js';
import type { RunSummary } from '../../types/index.js';

const SUMMARY: RunSummary = {
  mode: 'full',
  products: 12,
  specs: 340,
  reviews: 0,
  updatedReviews: 9,
  errors: 2,
  startedAt: new Date('2024-01-05T02:00:00.000Z'),
  completedAt: new Date('2024-01-05T03:02:05.000Z'),
  elapsedSeconds: 3725,
  success: true,
};

describe('formatRunSummary', () => {
  it('lists times and counts of a successful run', () => {
    expect(formatRunSummary(SUMMARY)).toEqual({
      subject: 'Full review update completed',
      text: [
        'Mode: full',
        'Started: 2024-01-05T02:00:00.000Z',
        'Finished: 2024-01-05T03:02:05.000Z',
        'Elapsed: 1h 2m 5s',
        '',
        'Products: 12',
        'Specs: 340',
        'Reviews: 0',
        'Updated reviews: 9',
        'Errors: 2',
      ].join('\n'),
    });
  });

  it('names the GPU and the error of a failed crawl', () => {
    const message = formatRunSummary({
      ...SUMMARY,
      mode: 'default',
      gpuName: 'Acme X1',
      success: false,
      error: 'catalog markup changed',
    });

    expect(message.subject).toBe('Catalog crawl (Acme X1) failed');
    expect(message.text.split('\n')[0]).toBe('Mode: default (Acme X1)');
    expect(message.text.split('\n').slice(-2)).toEqual(['', 'Error: catalog markup changed']);
  });
});

describe('sendRunSummary', () => {
  it('only logs the summary when no API key is configured', async () => {
    await expect(
      sendRunSummary(SUMMARY, { from: 'harvester@example.com', to: 'operators@example.com' })
    ).resolves.toBeUndefined();
  });
});
