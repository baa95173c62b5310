/**
 * Core types for the GPU catalog harvester
 */

export interface Product {
  id: number;
  name: string;
  vendor: string;
  description: string | null;
  imageUrl: string | null;
  status: ProductStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type ProductStatus = 'active' | 'inactive';

/**
 * Attributes supplied by the normalizer for a product or board
 */
export interface ProductAttributes {
  name: string;
  vendor: string;
  description?: string | null;
  imageUrl?: string | null;
  status?: ProductStatus;
}

export interface ProductRef {
  id: number;
  name: string;
}

export interface SpecCategory {
  id: number;
  domainTag: string;
  code: number;
  name: string;
}

/**
 * A spec as extracted, before its category is resolved to a code
 */
export interface SpecRecord {
  category: string;
  name: string;
  value: string;
}

export interface Spec {
  id: number;
  productId: number;
  categoryCode: number;
  name: string;
  value: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Review {
  id: number;
  masterProductId: number;
  type: string;
  title: string;
  body: string;
  mainUrl: string | null;
  pageUrl: string | null;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface ReviewDatumRecord {
  dataType: string;
  key: string;
  value: string;
  unit: string;
  productName: string;
}

export interface ReviewDatum extends ReviewDatumRecord {
  id: number;
  reviewId: number;
}

export type RunMode = 'default' | 'full' | 'incremental';

export type RunStatus = 'idle' | 'running' | 'completed' | 'failed';

export interface RunCounters {
  products: number;
  specs: number;
  reviews: number;
  updatedReviews: number;
  errors: number;
}

export interface RunSummary extends RunCounters {
  mode: RunMode;
  gpuName?: string;
  startedAt: Date;
  completedAt: Date;
  elapsedSeconds: number;
  success: boolean;
  error?: string;
}
