/**
 * Catalog record types
 */

export interface BookRecord {
  readonly title: string;
  readonly author: string;
  /** Publication year; fictional, may lie far in the future */
  readonly year: number;
  readonly description: string;
  readonly isbn: string;
}
