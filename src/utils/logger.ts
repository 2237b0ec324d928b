/**
 * Structured logging for the MCP Server using pino
 *
 * Logs are written to a file (mcp-server.jsonl) to avoid protocol conflicts
 * when running in stdio mode. See getLogDirectory() for the per-OS location.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { ensureLogDirectory, getMcpServerLogPath } from './paths.js';

// Session ID for correlation across log entries
let currentSessionId: string | undefined;

export function setSessionId(sessionId: string): void {
  currentSessionId = sessionId;
}

export function getSessionId(): string | undefined {
  return currentSessionId;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Create the pino logger instance
 *
 * Logs to file only: stdout carries the MCP protocol. A `silent` level or an
 * uncreatable log directory yields a logger with no transport at all.
 */
function createLogger(): Logger {
  const level = process.env['BOOK_SEARCH_LOG_LEVEL'] || 'info';

  const options: LoggerOptions = {
    name: 'book-search-mcp',
    level,
    base: {
      component: 'mcp-server',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (level === 'silent' || !ensureLogDirectory()) {
    return pino({ ...options, level: 'silent' });
  }

  const rotationSizeMb = parsePositiveInt(process.env['BOOK_SEARCH_LOG_ROTATION_SIZE_MB'], 50);
  const rotationCount = parsePositiveInt(process.env['BOOK_SEARCH_LOG_ROTATION_COUNT'], 5);

  return pino(
    options,
    pino.transport({
      target: 'pino-roll',
      options: {
        file: getMcpServerLogPath(),
        size: `${rotationSizeMb}m`,
        limit: { count: rotationCount },
        mkdir: true,
      },
    })
  );
}

const logger = createLogger();

/**
 * Create a child logger with session context
 */
export function createSessionLogger(sessionId?: string): Logger {
  const sid = sessionId ?? currentSessionId;
  if (sid) {
    return logger.child({ session_id: sid });
  }
  return logger;
}

export function logInfo(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.info(context, msg);
  } else {
    log.info(msg);
  }
}

export function logDebug(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.debug(context, msg);
  } else {
    log.debug(msg);
  }
}

export function logWarn(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.warn(context, msg);
  } else {
    log.warn(msg);
  }
}

/**
 * Log an error message, flattening an Error into message and stack fields
 */
export function logError(msg: string, error?: unknown, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  const errorContext: Record<string, unknown> = { ...context };

  if (error instanceof Error) {
    errorContext['error'] = error.message;
    errorContext['stack'] = error.stack;
  } else if (error !== undefined) {
    errorContext['error'] = String(error);
  }

  log.error(errorContext, msg);
}

/**
 * Log a tool invocation
 */
export function logToolCall(
  tool: string,
  durationMs?: number,
  success?: boolean,
  context?: Record<string, unknown>
): void {
  const log = createSessionLogger();
  log.info(
    {
      tool,
      duration_ms: durationMs,
      success,
      ...context,
    },
    'Tool called'
  );
}

export function logSessionEvent(event: 'start' | 'end', context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  log.info({ event, ...context }, `Session ${event}`);
}

export { logger };
