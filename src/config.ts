/**
 * Configuration loading and management
 * Loads from YAML config file with environment variable overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';

import {
  DEFAULT_CONFIG,
  FileConfigSchema,
  LocaleSchema,
  type FileConfig,
  type ServerConfig,
} from './types/config.js';
import { getConfigDirectory } from './utils/paths.js';
import { logWarn } from './utils/logger.js';

/**
 * Configuration search paths (in priority order)
 *
 * 1. BOOK_SEARCH_CONFIG_PATH environment variable (if set)
 * 2. Project-local: .book-search.yaml / .book-search.yml in CWD
 * 3. User home: ~/.book-search/config.yaml
 * 4. Platform config dir (see getConfigDirectory)
 */
export function getConfigSearchPaths(): string[] {
  const paths: string[] = [];

  const explicitPath = process.env['BOOK_SEARCH_CONFIG_PATH'];
  if (explicitPath) {
    paths.push(expandPath(explicitPath));
  }

  const cwd = process.cwd();
  paths.push(join(cwd, '.book-search.yaml'));
  paths.push(join(cwd, '.book-search.yml'));

  paths.push(join(homedir(), '.book-search', 'config.yaml'));
  paths.push(join(getConfigDirectory(), 'config.yaml'));

  return paths;
}

function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

function findConfigFile(): string | null {
  for (const path of getConfigSearchPaths()) {
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Read and validate a YAML config file. Unreadable or invalid files are
 * reported and treated as empty.
 */
export function loadConfigFromFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logWarn('Failed to read config file', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  // An empty YAML document parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logWarn('Ignoring invalid config file', {
      path: filePath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

export function mergeConfigs(base: ServerConfig, override: FileConfig): ServerConfig {
  return {
    search: {
      defaultLimit: override.search?.defaultLimit ?? base.search.defaultLimit,
    },
    render: {
      locale: override.render?.locale ?? base.render.locale,
    },
  };
}

export function applyEnvironmentOverrides(config: ServerConfig): ServerConfig {
  const result: ServerConfig = {
    search: { ...config.search },
    render: { ...config.render },
  };

  const limitEnv = process.env['BOOK_SEARCH_DEFAULT_LIMIT'];
  if (limitEnv) {
    const limit = Number(limitEnv);
    if (Number.isInteger(limit) && limit >= 0) {
      result.search.defaultLimit = limit;
    } else {
      logWarn('Ignoring invalid BOOK_SEARCH_DEFAULT_LIMIT', { value: limitEnv });
    }
  }

  const localeEnv = process.env['BOOK_SEARCH_LOCALE'];
  if (localeEnv) {
    const locale = LocaleSchema.safeParse(localeEnv);
    if (locale.success) {
      result.render.locale = locale.data;
    } else {
      logWarn('Ignoring unsupported BOOK_SEARCH_LOCALE', { value: localeEnv });
    }
  }

  return result;
}

export function loadConfig(): ServerConfig {
  let config = mergeConfigs(DEFAULT_CONFIG, {});

  const configPath = findConfigFile();
  if (configPath) {
    config = mergeConfigs(config, loadConfigFromFile(configPath));
  }

  return applyEnvironmentOverrides(config);
}
