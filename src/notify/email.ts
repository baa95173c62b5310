/**
 * Run summary email (Resend)
 */

import { Resend } from 'resend';
import { config } from '../config/index.js';
import { componentLogger } from '../utils/logger.js';
import type { RunSummary } from '../types/index.js';

const logger = componentLogger('notify');

export interface SummaryMessage {
  subject: string;
  text: string;
}

export interface NotifierOptions {
  apiKey?: string;
  from: string;
  to: string;
}

const MODE_LABELS: Record<RunSummary['mode'], string> = {
  default: 'Catalog crawl',
  full: 'Full review update',
  incremental: 'Incremental review update',
};

function formatElapsed(seconds: number): string {
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const rest = total % 60;
  return `${hours}h ${minutes}m ${rest}s`;
}

/**
 * Plain-text subject and body for a finished run
 */
export function formatRunSummary(summary: RunSummary): SummaryMessage {
  const label = MODE_LABELS[summary.mode];
  const target = summary.gpuName ? ` (${summary.gpuName})` : '';
  const subject = `${label}${target} ${summary.success ? 'completed' : 'failed'}`;

  const lines = [
    `Mode: ${summary.mode}${target}`,
    `Started: ${summary.startedAt.toISOString()}`,
    `Finished: ${summary.completedAt.toISOString()}`,
    `Elapsed: ${formatElapsed(summary.elapsedSeconds)}`,
    '',
    `Products: ${summary.products}`,
    `Specs: ${summary.specs}`,
    `Reviews: ${summary.reviews}`,
    `Updated reviews: ${summary.updatedReviews}`,
    `Errors: ${summary.errors}`,
  ];

  if (!summary.success) {
    lines.push('', `Error: ${summary.error ?? 'unknown error'}`);
  }

  return { subject, text: lines.join('\n') };
}

/**
 * Send the summary to the operator address. Without an API key it is only
 * logged.
 */
export async function sendRunSummary(
  summary: RunSummary,
  options: NotifierOptions = config.notifications
): Promise<void> {
  const message = formatRunSummary(summary);

  if (!options.apiKey) {
    logger.info({ subject: message.subject, body: message.text }, 'Email not configured, run summary logged');
    return;
  }

  const resend = new Resend(options.apiKey);
  const { data, error } = await resend.emails.send({
    from: options.from,
    to: options.to,
    subject: message.subject,
    text: message.text,
  });

  if (error) {
    throw new Error(`Run summary email failed: ${error.message}`);
  }

  logger.info({ messageId: data?.id, to: options.to }, 'Run summary email sent');
}
