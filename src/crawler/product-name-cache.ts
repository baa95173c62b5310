/**
 * Per-run map of known product names to their stored id
 *
 * Every product is registered under its full display name and, when it has
 * one, its name without the leading vendor word, so a listing row written
 * either way is recognized without touching the network.
 */

import { listProductRefs } from '../db/queries.js';
import { stripVendor } from '../scraper/parser.js';
import type { ProductRef } from '../types/index.js';

export class ProductNameCache {
  private readonly ids = new Map<string, number>();

  static fromStore(): ProductNameCache {
    return ProductNameCache.from(listProductRefs());
  }

  static from(products: readonly ProductRef[]): ProductNameCache {
    const cache = new ProductNameCache();
    for (const product of products) {
      cache.add(product.name, product.id);
    }
    return cache;
  }

  add(name: string, id: number): void {
    this.ids.set(name, id);
    const simplified = stripVendor(name);
    if (simplified) {
      this.ids.set(simplified, id);
    }
  }

  lookup(name: string): number | undefined {
    return this.ids.get(name);
  }

  /** Number of name keys, full and simplified */
  get size(): number {
    return this.ids.size;
  }
}
