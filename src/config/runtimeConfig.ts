/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - Provide a single parsed, typed surface for environment driven behavior.
 *  - Keep process.env reads out of the scanner / syncer / manager code paths.
 *
 * Variables (all optional):
 *  - CATALOG_LOG_LEVEL (error|warn|info|debug, default info), CATALOG_LOG_JSON, CATALOG_LOG_FILE
 *  - CATALOG_CACHE_TTL_MS (default 60000)
 *  - CATALOG_MANIFEST_DIR (override), CATALOG_MANIFEST_SCOPE (global|project|local, default project)
 *  - CATALOG_GLOBAL_ROOT, CATALOG_PROJECT_ROOT, CATALOG_LOCAL_ROOT
 *  - CATALOG_SEARCH_LIMIT (default 20), CATALOG_FUZZY_MIN_SCORE (default 50)
 *  - CATALOG_ATOMIC_WRITE_RETRIES (default 5), CATALOG_ATOMIC_WRITE_BACKOFF_MS (default 10)
 */
import path from 'path';
import { getBooleanEnv, getEnumEnv, getOptionalStringEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type ManifestScope = 'global' | 'project' | 'local';
const MANIFEST_SCOPES: readonly ManifestScope[] = ['global', 'project', 'local'];

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  file?: string;
}

interface ScopeRootsConfig {
  global?: string;
  project?: string;
  local?: string;
}

interface CatalogConfig {
  cacheTtlMs: number;
  manifestDir?: string;
  manifestScope: ManifestScope;
  roots: ScopeRootsConfig;
}

interface SearchConfig {
  defaultLimit: number;
  fuzzyMinScore: number;
}

interface AtomicFsConfig {
  retries: number;
  backoffMs: number;
}

export interface RuntimeConfig {
  logging: LoggingConfig;
  catalog: CatalogConfig;
  search: SearchConfig;
  atomicFs: AtomicFsConfig;
}

const CWD = process.cwd();

function toAbsolute(raw: string | undefined): string | undefined {
  if(!raw) return undefined;
  return path.isAbsolute(raw) ? raw : path.resolve(CWD, raw);
}

function numberFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if(!raw) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

function clamp(value: number, min: number, max: number): number {
  if(value < min) return min;
  if(value > max) return max;
  return value;
}

function parseLoggingConfig(): LoggingConfig {
  return {
    level: getEnumEnv('CATALOG_LOG_LEVEL', LOG_LEVELS, 'info'),
    json: getBooleanEnv('CATALOG_LOG_JSON'),
    file: toAbsolute(getOptionalStringEnv('CATALOG_LOG_FILE')),
  };
}

function parseCatalogConfig(): CatalogConfig {
  return {
    cacheTtlMs: Math.max(0, numberFromEnv('CATALOG_CACHE_TTL_MS', 60_000)),
    manifestDir: toAbsolute(getOptionalStringEnv('CATALOG_MANIFEST_DIR')),
    manifestScope: getEnumEnv('CATALOG_MANIFEST_SCOPE', MANIFEST_SCOPES, 'project'),
    roots: {
      global: toAbsolute(getOptionalStringEnv('CATALOG_GLOBAL_ROOT')),
      project: toAbsolute(getOptionalStringEnv('CATALOG_PROJECT_ROOT')),
      local: toAbsolute(getOptionalStringEnv('CATALOG_LOCAL_ROOT')),
    },
  };
}

function parseSearchConfig(): SearchConfig {
  return {
    defaultLimit: clamp(Math.trunc(numberFromEnv('CATALOG_SEARCH_LIMIT', 20)), 1, 1000),
    fuzzyMinScore: Math.max(0, numberFromEnv('CATALOG_FUZZY_MIN_SCORE', 50)),
  };
}

function parseAtomicFsConfig(): AtomicFsConfig {
  return {
    retries: clamp(Math.trunc(numberFromEnv('CATALOG_ATOMIC_WRITE_RETRIES', 5)), 1, 20),
    backoffMs: clamp(numberFromEnv('CATALOG_ATOMIC_WRITE_BACKOFF_MS', 10), 1, 1000),
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    logging: parseLoggingConfig(),
    catalog: parseCatalogConfig(),
    search: parseSearchConfig(),
    atomicFs: parseAtomicFsConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}
