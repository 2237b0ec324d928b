#!/usr/bin/env node
/**
 * book-search-mcp - MCP Server Entry Point
 *
 * Serves a single tool, `search`, over a fixed catalog of fictional books.
 * Speaks MCP over stdio via @modelcontextprotocol/sdk.
 */

import { loadConfig } from './config.js';
import { createServer, BookSearchMcpServer } from './server.js';

// stdout carries the MCP protocol; keep stray console output off it.
// console.error and console.warn still reach stderr.
console.log = (): void => {};
console.info = (): void => {};
console.debug = (): void => {};

let server: BookSearchMcpServer | null = null;

async function main(): Promise<void> {
  const config = loadConfig();

  const shutdown = async (): Promise<void> => {
    if (server) {
      await server.stop();
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });

  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });

  try {
    server = await createServer(config, true);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
