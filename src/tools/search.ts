/**
 * Search tool implementation
 *
 * Provides:
 * - Case-insensitive substring matching over title, author and description
 * - Catalog-order results truncated to a limit
 * - Argument decoding with InvalidParams errors for malformed input
 */

import {
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ZodError } from 'zod';

import { bookCatalog, type CatalogStore } from '../catalog/index.js';
import { renderSearchResults, type ResponseTemplates } from '../render/index.js';
import {
  SearchInputSchema,
  type BookRecord,
  type InvalidParamsIssue,
  type SearchQuery,
} from '../types/index.js';

export const SEARCH_TOOL_NAME = 'search';
export const DEFAULT_SEARCH_LIMIT = 5;

export interface SearchToolConfig {
  templates: ResponseTemplates;
  defaultLimit?: number;
}

function bookMatches(book: BookRecord, needle: string): boolean {
  return (
    book.title.toLowerCase().includes(needle) ||
    book.author.toLowerCase().includes(needle) ||
    book.description.toLowerCase().includes(needle)
  );
}

/**
 * Filter records whose title, author or description contains `keyword`
 * (case-insensitive), keeping catalog order and at most `limit` entries.
 * A zero or negative limit yields no results.
 */
export function matchBooks(
  records: readonly BookRecord[],
  keyword: string,
  limit: number = DEFAULT_SEARCH_LIMIT
): BookRecord[] {
  const matches: BookRecord[] = [];
  if (limit <= 0) {
    return matches;
  }

  const needle = keyword.toLowerCase();
  for (const book of records) {
    if (bookMatches(book, needle)) {
      matches.push(book);
      if (matches.length >= limit) break;
    }
  }
  return matches;
}

function describeIssues(error: ZodError): InvalidParamsIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Search tool over the fictional book catalog
 */
export class SearchTool {
  static readonly definition: Tool = {
    name: SEARCH_TOOL_NAME,
    description: 'Search for book in our fictional database',
    inputSchema: {
      type: 'object',
      properties: {
        keyword: {
          type: 'string',
          description: '検索キーワード',
        },
        limit: {
          type: 'integer',
          description: `最大結果数 (default: ${DEFAULT_SEARCH_LIMIT})`,
        },
      },
      required: ['keyword'],
    },
    annotations: {
      title: 'Search Books',
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
  };

  private readonly templates: ResponseTemplates;
  private readonly defaultLimit: number;
  private readonly catalog: CatalogStore;

  constructor(config: SearchToolConfig, catalog: CatalogStore = bookCatalog) {
    this.templates = config.templates;
    this.defaultLimit = config.defaultLimit ?? DEFAULT_SEARCH_LIMIT;
    this.catalog = catalog;
  }

  /**
   * Decode raw tool arguments into a query, applying the default limit.
   * Throws McpError(InvalidParams) when the arguments do not fit the schema.
   */
  parseQuery(args: unknown): SearchQuery {
    const parsed = SearchInputSchema.safeParse(args);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
      throw new McpError(ErrorCode.InvalidParams, `Invalid search parameters: ${summary}`, {
        issues,
      });
    }

    return {
      keyword: parsed.data.keyword,
      limit: parsed.data.limit ?? this.defaultLimit,
    };
  }

  /**
   * Run a search and render the matches as one text content item
   */
  search(args: unknown): CallToolResult {
    const { keyword, limit } = this.parseQuery(args);
    const matches = matchBooks(this.catalog.records(), keyword, limit);

    return {
      content: [{ type: 'text', text: renderSearchResults(keyword, matches, this.templates) }],
    };
  }
}
