/**
 * Tests for CatalogStore
 */

import { describe, it, expect, vi } from 'vitest';
import { CatalogStore, bookCatalog, FICTIONAL_BOOKS } from '../../src/catalog/index.js';
import type { BookRecord } from '../../src/types/index.js';

const SAMPLE: BookRecord[] = [
  { title: 'Book A', author: 'Author A', year: 2100, description: 'First', isbn: 'isbn-a' },
  { title: 'Book B', author: 'Author B', year: 2200, description: 'Second', isbn: 'isbn-b' },
];

describe('CatalogStore', () => {
  it('should not run the loader until first access', () => {
    const loader = vi.fn(() => SAMPLE);
    const store = new CatalogStore(loader);

    expect(loader).not.toHaveBeenCalled();
    expect(store.isInitialized()).toBe(false);
  });

  it('should run the loader exactly once across repeated reads', () => {
    const loader = vi.fn(() => SAMPLE);
    const store = new CatalogStore(loader);

    const first = store.records();
    const second = store.records();
    store.records();

    expect(loader).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(store.isInitialized()).toBe(true);
  });

  it('should keep insertion order and content', () => {
    const store = new CatalogStore(() => SAMPLE);

    expect(store.records().map((book) => book.isbn)).toEqual(['isbn-a', 'isbn-b']);
    expect(store.records()[1]).toEqual(SAMPLE[1]);
  });

  it('should freeze the array and each record', () => {
    const store = new CatalogStore(() => SAMPLE);
    const records = store.records();

    expect(Object.isFrozen(records)).toBe(true);
    expect(records.every((book) => Object.isFrozen(book))).toBe(true);
  });

  it('should copy records rather than expose the loader output', () => {
    const store = new CatalogStore(() => SAMPLE);
    const [first] = store.records();

    expect(first).not.toBe(SAMPLE[0]);
    expect(first).toEqual(SAMPLE[0]);
  });
});

describe('bookCatalog', () => {
  it('should hold the five fictional books in seed order', () => {
    const records = bookCatalog.records();

    expect(records).toHaveLength(5);
    expect(records.map((book) => book.isbn)).toEqual([
      '978-0-123456-47-11',
      '978-0-123456-47-12',
      '978-0-123456-47-13',
      '978-0-123456-47-14',
      '978-0-123456-47-15',
    ]);
    expect(records).toEqual(FICTIONAL_BOOKS);
  });
});
