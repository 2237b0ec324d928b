/**
 * Locale-specific phrasing for search responses and server instructions
 */

import type { Locale } from '../types/index.js';

export interface FieldLabels {
  title: string;
  author: string;
  year: string;
  isbn: string;
  description: string;
}

export interface ResponseTemplates {
  /** Text returned to the client in the initialize response */
  instructions: string;
  header(keyword: string): string;
  noResults(keyword: string): string;
  labels: FieldLabels;
}

const ja: ResponseTemplates = {
  instructions:
    '架空の本のデータベースを検索するサーバーです。タイトル、著者、説明文で検索できます。',
  header: (keyword) => `キーワード '${keyword}' の検索結果:`,
  noResults: (keyword) => `キーワード '${keyword}' に一致する本が見つかりませんでした。`,
  labels: {
    title: 'タイトル',
    author: '著者',
    year: '出版年',
    isbn: 'ISBN',
    description: '説明',
  },
};

const en: ResponseTemplates = {
  instructions:
    'Searches a database of fictional books. Keywords match against title, author and description.',
  header: (keyword) => `Search results for keyword '${keyword}':`,
  noResults: (keyword) => `No books found matching keyword '${keyword}'.`,
  labels: {
    title: 'Title',
    author: 'Author',
    year: 'Year',
    isbn: 'ISBN',
    description: 'Description',
  },
};

const TEMPLATES: Record<Locale, ResponseTemplates> = { ja, en };

export function getTemplates(locale: Locale): ResponseTemplates {
  return TEMPLATES[locale];
}
