/**
 * MCP tools exports
 *
 * A single tool is served:
 * - search: keyword search over the fictional book catalog
 */

export * from './search.js';
