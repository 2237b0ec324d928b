/**
 * MCP tool input types for book-search-mcp
 */

import { z } from 'zod';

// ============================================================================
// Search Tool Types
// ============================================================================

export const SearchInputSchema = z.object({
  keyword: z.string({ required_error: 'keyword is required' }).describe('検索キーワード'),
  // null is accepted as "not given"
  limit: z.number().int().nullish().describe('最大結果数'),
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

export interface SearchQuery {
  keyword: string;
  limit: number;
}

/**
 * Structured detail attached to an InvalidParams error
 */
export interface InvalidParamsIssue {
  path: string;
  message: string;
}

// ============================================================================
// Error codes
// ============================================================================

/**
 * JSON-RPC code for "resource not found"; the SDK's ErrorCode enum does not
 * carry it.
 */
export const RESOURCE_NOT_FOUND = -32002;
