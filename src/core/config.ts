import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir, tmpdir } from 'os';
import { ConfigError } from './errors.js';

export interface LayoutOptions {
  /** Narrowest terminal that still gets the summary box. */
  minWidth: number;
  /** Shortest terminal that still gets the summary box. */
  minHeight: number;
  /** Below this many visible characters the log tail is not drawn. */
  logMinCharacters: number;
}

export interface UpdateConfig {
  logDir: string;
  refreshIntervalMs: number;
  layout: LayoutOptions;
}

const CONFIG_FILENAME = '.full-update.json';

export function getConfigPath(): string {
  return join(homedir(), CONFIG_FILENAME);
}

export function defaultConfig(): UpdateConfig {
  return {
    logDir: tmpdir(),
    refreshIntervalMs: 1000,
    layout: {
      minWidth: 45,
      minHeight: 11,
      logMinCharacters: 300,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPositiveInt(source: Record<string, unknown>, key: string, fallback: number, path: string): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(path, `"${key}" must be a positive integer`);
  }
  return value;
}

/**
 * Validate a parsed config file and merge it over the defaults.
 */
export function parseConfig(raw: unknown, path: string): UpdateConfig {
  const defaults = defaultConfig();
  if (!isRecord(raw)) {
    throw new ConfigError(path, 'expected a JSON object');
  }

  let logDir = defaults.logDir;
  if (raw.logDir !== undefined) {
    if (typeof raw.logDir !== 'string' || raw.logDir.trim() === '') {
      throw new ConfigError(path, '"logDir" must be a non-empty string');
    }
    logDir = raw.logDir;
  }

  const layoutRaw = raw.layout ?? {};
  if (!isRecord(layoutRaw)) {
    throw new ConfigError(path, '"layout" must be an object');
  }

  return {
    logDir,
    refreshIntervalMs: readPositiveInt(raw, 'refreshIntervalMs', defaults.refreshIntervalMs, path),
    layout: {
      minWidth: readPositiveInt(layoutRaw, 'minWidth', defaults.layout.minWidth, path),
      minHeight: readPositiveInt(layoutRaw, 'minHeight', defaults.layout.minHeight, path),
      logMinCharacters: readPositiveInt(layoutRaw, 'logMinCharacters', defaults.layout.logMinCharacters, path),
    },
  };
}

export function loadConfig(configPath: string = getConfigPath()): UpdateConfig {
  if (!existsSync(configPath)) {
    return defaultConfig();
  }
  const raw = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }
  return parseConfig(parsed, configPath);
}
