/**
 * Read-only book catalog, built on first access
 */

import type { BookRecord } from '../types/index.js';
import { FICTIONAL_BOOKS } from './seed.js';

export type CatalogLoader = () => readonly BookRecord[];

export class CatalogStore {
  private readonly loader: CatalogLoader;
  private cached: readonly BookRecord[] | null = null;

  constructor(loader: CatalogLoader) {
    this.loader = loader;
  }

  /**
   * Catalog records in insertion order. The loader runs once; later calls
   * return the same frozen array.
   */
  records(): readonly BookRecord[] {
    if (this.cached === null) {
      const books = this.loader().map((book) => Object.freeze({ ...book }));
      this.cached = Object.freeze(books);
    }
    return this.cached;
  }

  isInitialized(): boolean {
    return this.cached !== null;
  }
}

/** Process-wide catalog of fictional books */
export const bookCatalog = new CatalogStore(() => FICTIONAL_BOOKS);
