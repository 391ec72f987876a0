/**
 * Configuration loader for movie-shelf
 * Loads from an optional YAML config file with environment variable expansion
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { loadEnv, type EnvVars } from './env.js';
import { ConfigError, errorMessage } from './errors.js';
import type { MovieShelfConfig, StorageFormat } from './types.js';

const DEFAULT_OMDB_URL = 'https://www.omdbapi.com';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_FUZZY_THRESHOLD = 0.7;
const DEFAULT_SITE_TITLE = 'My Movie App';

const STORAGE_FORMATS: readonly StorageFormat[] = ['json', 'csv'];

export interface LoadConfigOptions {
  /** Explicit config file; wins over every candidate location */
  configPath?: string;
  cwd?: string;
  env?: EnvVars;
  storageFormat?: string;
  storagePath?: string;
}

type RawSection = Record<string, unknown>;

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown, env: EnvVars): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown, env: EnvVars): unknown {
  if (Array.isArray(obj)) return obj.map((item) => deepExpand(item, env));
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v, env);
    }
    return out;
  }
  return expandEnv(obj, env);
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function num(value: unknown, key: string): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${key} must be a number (got ${JSON.stringify(value)})`);
  }
  return n;
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string, cwd: string, env: EnvVars): string | null {
  const candidates = [
    env.MOVIE_SHELF_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(cwd, 'movie-shelf.yaml'),
    path.join(cwd, 'config/movie-shelf.yaml'),
  ].filter((p): p is string => Boolean(p));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function readYaml(filePath: string, env: EnvVars): RawSection {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${errorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  const expanded = deepExpand(parsed, env);
  if (!isRecord(expanded)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return expanded;
}

function parseFormat(value: string | undefined): StorageFormat {
  const format = (value ?? 'json').toLowerCase();
  const match = STORAGE_FORMATS.find((f) => f === format);
  if (!match) {
    throw new ConfigError(`storage.format must be one of ${STORAGE_FORMATS.join(', ')} (got "${value}")`);
  }
  return match;
}

/**
 * Load and validate configuration.
 * A missing config file is not an error: every setting has a default.
 */
export function loadConfig(baseDir: string, opts: LoadConfigOptions = {}): MovieShelfConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? loadEnv(cwd);

  let configPath: string | null = opts.configPath ?? null;
  if (configPath && !fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  configPath = configPath ?? findConfigFile(baseDir, cwd, env);

  const raw = configPath ? readYaml(configPath, env) : {};
  const storage = section(raw, 'storage');
  const omdb = section(raw, 'omdb');
  const reports = section(raw, 'reports');
  const search = section(raw, 'search');
  const activity = section(raw, 'activity');

  const resolve = (p: string) => path.resolve(cwd, p);

  const format = parseFormat(opts.storageFormat ?? str(storage.format));
  const storagePath = opts.storagePath ?? str(storage.path) ?? `data/movies.${format}`;

  const timeoutMs = num(omdb.timeoutMs, 'omdb.timeoutMs') ?? DEFAULT_TIMEOUT_MS;
  if (timeoutMs <= 0) {
    throw new ConfigError('omdb.timeoutMs must be positive');
  }

  const fuzzyThreshold = num(search.fuzzyThreshold, 'search.fuzzyThreshold') ?? DEFAULT_FUZZY_THRESHOLD;
  if (fuzzyThreshold <= 0 || fuzzyThreshold > 1) {
    throw new ConfigError('search.fuzzyThreshold must be in (0, 1]');
  }

  return {
    storage: {
      format,
      path: resolve(storagePath),
    },
    omdb: {
      apiKey: str(omdb.apiKey) ?? env.OMDB_API_KEY?.trim() ?? '',
      baseUrl: (str(omdb.baseUrl) ?? DEFAULT_OMDB_URL).replace(/\/$/, ''),
      timeoutMs,
    },
    reports: {
      histogramPath: resolve(str(reports.histogramPath) ?? 'output/rating-histogram.svg'),
      sitePath: resolve(str(reports.sitePath) ?? 'output/index.html'),
      templatePath: resolve(str(reports.templatePath) ?? path.join(baseDir, 'templates/index_template.html')),
      siteTitle: str(reports.siteTitle) ?? DEFAULT_SITE_TITLE,
    },
    search: {
      fuzzyThreshold,
    },
    activity: {
      enabled: activity.enabled !== false,
      path: resolve(str(activity.path) ?? 'data/activity.json'),
    },
  };
}

/**
 * Get config file path for display
 */
export function getConfigPath(baseDir: string, cwd: string = process.cwd(), env: EnvVars = process.env): string | null {
  return findConfigFile(baseDir, cwd, env);
}
