/**
 * Scraper Types
 */

import type { FetchExhaustedError } from '../utils/errors.js';
import type { ProductAttributes, ReviewDatumRecord, SpecRecord } from '../types/index.js';

export interface FetchOptions {
  /** Resolve the URL against the site base URL */
  relative?: boolean;
  /** Fetch even if the URL was already fetched in this run */
  bypassDedup?: boolean;
  /** Multiplier applied to the politeness pause after success */
  delayScale?: number;
}

export type FetchOutcome =
  | { status: 'ok'; body: string; url: string }
  | { status: 'duplicate'; url: string }
  | { status: 'failed'; error: FetchExhaustedError };

/**
 * Anything that can serve catalog pages
 */
export interface PageSource {
  fetch(url: string, options?: FetchOptions): Promise<FetchOutcome>;
}

/**
 * A row of the catalog listing
 */
export interface ProductListing {
  name: string;
  url: string;
}

export interface ProductDetail {
  attributes: ProductAttributes;
  specs: SpecRecord[];
}

/**
 * A row of a product page's boards table
 */
export interface BoardListing {
  sectionTitle: string;
  name: string;
  url?: string;
  reviewUrl?: string;
  /** Column header -> cell text */
  columns: Record<string, string>;
}

export interface ReviewOption {
  /** Option label without its numeric page prefix */
  text: string;
  originalText: string;
  /** Sub-page URL */
  value: string;
}

export interface ReviewSection {
  title: string;
  content: string;
}

export interface ReviewImage {
  section: string;
  url: string;
  alt: string;
  kind: 'chart' | 'image';
}

export interface ReviewContent {
  title: string;
  body: string;
  sections: ReviewSection[];
  images: ReviewImage[];
  data: ReviewDatumRecord[];
  /** Board specs recognized in the review text */
  specs: SpecRecord[];
}
