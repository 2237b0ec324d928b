/**
 * Configuration types for book-search-mcp
 */

import { z } from 'zod';

export const LocaleSchema = z.enum(['ja', 'en']);
export type Locale = z.infer<typeof LocaleSchema>;

export interface SearchConfig {
  /** Result cap applied when a query omits `limit` */
  defaultLimit: number;
}

export interface RenderConfig {
  locale: Locale;
}

export interface ServerConfig {
  search: SearchConfig;
  render: RenderConfig;
}

/**
 * Shape accepted from a YAML config file. Every section and key is optional;
 * missing values fall back to DEFAULT_CONFIG.
 */
export const FileConfigSchema = z.object({
  search: z
    .object({
      defaultLimit: z.number().int().min(0).optional(),
    })
    .optional(),
  render: z
    .object({
      locale: LocaleSchema.optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export const DEFAULT_CONFIG: ServerConfig = {
  search: {
    defaultLimit: 5,
  },
  render: {
    locale: 'ja',
  },
};
