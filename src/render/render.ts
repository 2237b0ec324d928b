import type { BookRecord } from '../types/index.js';
import type { ResponseTemplates } from './templates.js';

function renderBook(book: BookRecord, templates: ResponseTemplates): string {
  const { labels } = templates;
  return [
    `${labels.title}: ${book.title}`,
    `${labels.author}: ${book.author}`,
    `${labels.year}: ${book.year}`,
    `${labels.isbn}: ${book.isbn}`,
    `${labels.description}: ${book.description}`,
  ].join('\n');
}

/**
 * Render a match set as a single text block.
 *
 * An empty match set yields only the "no results" line. Otherwise a header
 * line is followed by one block per book, each block trailed by a blank line.
 */
export function renderSearchResults(
  keyword: string,
  matches: readonly BookRecord[],
  templates: ResponseTemplates
): string {
  if (matches.length === 0) {
    return templates.noResults(keyword);
  }

  let output = `${templates.header(keyword)}\n\n`;
  for (const book of matches) {
    output += `${renderBook(book, templates)}\n\n`;
  }
  return output;
}
