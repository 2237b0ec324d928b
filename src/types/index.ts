export * from './book.js';
export * from './config.js';
export * from './mcp.js';
