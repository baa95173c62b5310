/**
 * In-process page source and HTML builders shared by the tests
 */

import { FetchExhaustedError, TransientFetchError } from '../utils/errors.js';
import type { FetchOptions, FetchOutcome, PageSource } from '../scraper/types.js';

export const BASE_URL = 'https://catalog.test';
export const CATALOG_PATH = '/gpu-specs/';
export const DOMAIN_TAG = 'GPU Specs';

/**
 * Serves fixed HTML by path. Unknown paths fail like an exhausted fetch.
 */
export class FakePageSource implements PageSource {
  readonly requests: string[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    if (!options.bypassDedup && this.seen.has(url)) {
      return { status: 'duplicate', url };
    }
    this.requests.push(url);

    const body = this.pages[url];
    if (body === undefined) {
      const error = new TransientFetchError(url, 'HTTP 404: Not Found', 404);
      return { status: 'failed', error: new FetchExhaustedError(url, 1, error) };
    }

    this.seen.add(url);
    return { status: 'ok', body, url };
  }
}

export function catalogPage(products: ReadonlyArray<{ name: string; url: string }>): string {
  const rows = products
    .map((product) => `<tr><td><a href="${product.url}">${product.name}</a></td><td>AX100</td></tr>`)
    .join('\n');

  return `<html><body>
<table class="processors">
  <thead class="colheader"><tr><th>Product Name</th><th>GPU Chip</th></tr></thead>
  <tbody>${rows}</tbody>
</table>
</body></html>`;
}

export interface BoardRow {
  name: string;
  url?: string;
  reviewUrl?: string;
  clock: string;
}

export function productPage(options: {
  name: string;
  specs: ReadonlyArray<{ category: string; name: string; value: string }>;
  boards?: readonly BoardRow[];
}): string {
  const byCategory = new Map<string, string[]>();
  for (const spec of options.specs) {
    const entries = byCategory.get(spec.category) ?? [];
    entries.push(`<dl><dt>${spec.name}</dt><dd>${spec.value}</dd></dl>`);
    byCategory.set(spec.category, entries);
  }

  const sections = [...byCategory.entries()]
    .map(([category, entries]) => `<section><h2>${category}</h2>${entries.join('')}</section>`)
    .join('\n');

  const boardRows = (options.boards ?? [])
    .map((board) => {
      const link = board.url ? `<a href="${board.url}">${board.name}</a>` : `<a>${board.name}</a>`;
      const review = board.reviewUrl ? `<a class="board-review-by-tpu" href="${board.reviewUrl}">Review</a>` : '';
      return `<tr><td><div class="board-table-title__inner">${link}</div></td><td>${board.clock}</td><td>${review}</td></tr>`;
    })
    .join('\n');

  const boards = options.boards
    ? `<section id="boards"><h2>${options.name} Boards</h2>
<table>
  <thead><tr><th class="sort-key">Name</th><th class="sort-key">GPU Clock</th><th class="sort-key">Review</th></tr></thead>
  <tbody>${boardRows}</tbody>
</table></section>`
    : '';

  return `<html><body>
<h1 class="gpudb-name">${options.name}</h1>
<div class="desc p">${options.name} test card.</div>
<div class="sectioncontainer">
${sections}
</div>
${boards}
</body></html>`;
}

export function reviewMainPage(options: {
  postedDate?: string;
  pages: ReadonlyArray<{ label: string; url: string }>;
}): string {
  const choices = options.pages
    .map((page) => `<option value="${page.url}">${page.label}</option>`)
    .join('');
  const posted = options.postedDate ? `<time datetime="${options.postedDate}T08:00:00Z">posted</time>` : '';

  return `<html><body>
${posted}
<select id="pagesel">${choices}</select>
<div class="text p"><h2>Introduction</h2><p>Welcome to the review.</p></div>
</body></html>`;
}

export const CIRCUIT_REVIEW_TEXT =
  'A 10+3 phase VRM powers the GPU. It is managed by a Monolithic Power Systems MP2891 controller.';

export function circuitReviewPage(text: string = CIRCUIT_REVIEW_TEXT): string {
  return `<html><body>
<div class="text p">
  <h2>Circuit Board Analysis</h2>
  <p>${text}</p>
  <div class="responsive-image-xx"><img src="/img/pcb-front.jpg" alt="PCB front"></div>
  <p>The card weighs 1250 g and uses five heatpipes.</p>
</div>
</body></html>`;
}

export function thermalReviewPage(): string {
  return `<html><body>
<div class="text p"><h2>Temperatures</h2><p>Idle and gaming temperatures.</p></div>
<table>
  <thead><tr><th>Card</th><th>Idle</th><th>Gaming</th></tr></thead>
  <tbody>
    <tr class="active"><td>Vendor X1 OC</td><td>32 °C</td><td>68 °C</td></tr>
    <tr><td>Other Card</td><td>40 °C</td><td>75 °C</td></tr>
  </tbody>
</table>
</body></html>`;
}

/**
 * A promise that is settled from outside
 */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
