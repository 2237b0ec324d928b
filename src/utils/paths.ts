/**
 * Platform-specific path utilities for book-search-mcp
 */

import { join } from 'node:path';
import { platform, homedir, tmpdir } from 'node:os';
import { mkdirSync, existsSync } from 'node:fs';

export const APP_DIR_NAME = 'book-search-mcp';

/**
 * Returns the canonical OS-specific log directory.
 *
 * Precedence:
 * 1. `BOOK_SEARCH_LOG_DIR` environment variable (explicit override)
 * 2. Platform-specific default:
 *    - Linux: $XDG_STATE_HOME/book-search-mcp/logs/ (default: ~/.local/state/book-search-mcp/logs/)
 *    - macOS: ~/Library/Logs/book-search-mcp/
 *    - Windows: %LOCALAPPDATA%\book-search-mcp\logs\
 *
 * Falls back to temp directory if home cannot be determined.
 */
export function getLogDirectory(): string {
  const customDir = process.env['BOOK_SEARCH_LOG_DIR'];
  if (customDir) {
    return customDir;
  }

  const home = homedir() || tmpdir();

  switch (platform()) {
    case 'linux': {
      const xdgStateHome = process.env['XDG_STATE_HOME'] ?? join(home, '.local', 'state');
      return join(xdgStateHome, APP_DIR_NAME, 'logs');
    }

    case 'darwin':
      return join(home, 'Library', 'Logs', APP_DIR_NAME);

    case 'win32': {
      const localAppData = process.env['LOCALAPPDATA'] ?? join(home, 'AppData', 'Local');
      return join(localAppData, APP_DIR_NAME, 'logs');
    }

    default:
      return join(home, '.book-search', 'logs');
  }
}

/**
 * Ensures the log directory exists, creating it if necessary.
 * Returns true if directory exists or was created, false on error.
 */
export function ensureLogDirectory(): boolean {
  const logDir = getLogDirectory();

  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    return true;
  } catch {
    // Caller falls back to silent logging
    return false;
  }
}

/**
 * Returns the full path to the MCP server log file.
 */
export function getMcpServerLogPath(): string {
  return join(getLogDirectory(), 'mcp-server.jsonl');
}

/**
 * Returns the platform config directory.
 *
 * - Linux: $XDG_CONFIG_HOME/book-search-mcp/ (default: ~/.config/book-search-mcp/)
 * - Windows: %LOCALAPPDATA%\book-search-mcp\
 * - macOS: ~/Library/Application Support/book-search-mcp/
 * - other: ~/.book-search/
 */
export function getConfigDirectory(): string {
  const home = homedir() || tmpdir();

  switch (platform()) {
    case 'linux': {
      const xdgConfigHome = process.env['XDG_CONFIG_HOME'] ?? join(home, '.config');
      return join(xdgConfigHome, APP_DIR_NAME);
    }

    case 'win32': {
      const localAppData = process.env['LOCALAPPDATA'] ?? join(home, 'AppData', 'Local');
      return join(localAppData, APP_DIR_NAME);
    }

    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_DIR_NAME);

    default:
      return join(home, '.book-search');
  }
}
