import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { getCacheRoot } from '../cache/cachePaths.js';
import { createLogger } from './logger.js';
import { warn } from './warnings.js';

const log = createLogger('config');

export const DEFAULT_MAX_SIZE_MB = 1024;
export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_SCAN_DEPTH = 3;
export const DEFAULT_PYTHON = 'python3';

export type CacheSettings = {
  enabled: boolean;
  /** Directory holding artifacts and `cache_metadata.json`. */
  directory: string;
  maxSizeMB: number;
  retentionDays: number;
};

export type DiscoverySettings = {
  enabled: boolean;
  /** How many sibling hops away from the entry script are still scanned. */
  maxDepth: number;
  /** Interpreter asked for its stdlib names and module search path. */
  python: string;
  /** Additional `module -> submodules` rows for the heuristic table. */
  extraSubmodules: Record<string, string[]>;
  /** Names never reported, on top of the built-in exclusions. */
  excluded: string[];
};

export type ExepackSettings = {
  debug: boolean;
  cache: CacheSettings;
  discovery: DiscoverySettings;
};

/** Shape of the default export of `exepack.config.js`. */
export type ExepackConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  cache?: Partial<CacheSettings>;
  discovery?: Partial<DiscoverySettings>;
};

let cached:
  | { loaded: true; config: Record<string, unknown> | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'exepack.config.js');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((s) => typeof s === 'string');
}

function invalid(field: string, value: unknown) {
  warn({
    code: 'INVALID_CONFIG',
    message: `ignoring ${field}=${JSON.stringify(value)}`,
    hint: 'falling back to the default value',
  });
}

function positive(field: string, value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
  invalid(field, value);
  return fallback;
}

function flag(field: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  invalid(field, value);
  return fallback;
}

function submoduleTable(value: unknown): Record<string, string[]> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    invalid('discovery.extraSubmodules', value);
    return {};
  }
  const table: Record<string, string[]> = {};
  for (const [mod, subs] of Object.entries(value)) {
    if (isStringArray(subs)) table[mod] = subs;
    else invalid(`discovery.extraSubmodules.${mod}`, subs);
  }
  return table;
}

export function defaultSettings(): ExepackSettings {
  return {
    debug: false,
    cache: {
      enabled: true,
      directory: getCacheRoot(),
      maxSizeMB: DEFAULT_MAX_SIZE_MB,
      retentionDays: DEFAULT_RETENTION_DAYS,
    },
    discovery: {
      enabled: true,
      maxDepth: DEFAULT_SCAN_DEPTH,
      python: DEFAULT_PYTHON,
      extraSubmodules: {},
      excluded: [],
    },
  };
}

/**
 * Merge a (possibly hand-written, possibly wrong) config over the defaults.
 * Bad values never throw; they are reported and replaced by the default.
 */
export function resolveSettings(
  config: unknown,
  projectRoot: string = process.cwd(),
): ExepackSettings {
  const base = defaultSettings();
  if (config == null) return base;
  if (!isRecord(config)) {
    invalid('config', config);
    return base;
  }

  const cache = isRecord(config.cache) ? config.cache : {};
  const discovery = isRecord(config.discovery) ? config.discovery : {};

  let directory = base.cache.directory;
  if (typeof cache.directory === 'string' && cache.directory.length) {
    directory = resolve(projectRoot, cache.directory);
  } else if (cache.directory !== undefined) {
    invalid('cache.directory', cache.directory);
  }

  let maxDepth = base.discovery.maxDepth;
  if (discovery.maxDepth !== undefined) {
    const d = discovery.maxDepth;
    if (typeof d === 'number' && Number.isInteger(d) && d >= 0) maxDepth = d;
    else invalid('discovery.maxDepth', d);
  }

  let python = base.discovery.python;
  if (typeof discovery.python === 'string' && discovery.python.length) {
    python = discovery.python;
  } else if (discovery.python !== undefined) {
    invalid('discovery.python', discovery.python);
  }

  let excluded: string[] = [];
  if (isStringArray(discovery.excluded)) excluded = discovery.excluded;
  else if (discovery.excluded !== undefined) invalid('discovery.excluded', discovery.excluded);

  return {
    debug: flag('debug', config.debug, base.debug),
    cache: {
      enabled: flag('cache.enabled', cache.enabled, base.cache.enabled),
      directory,
      maxSizeMB: positive('cache.maxSizeMB', cache.maxSizeMB, base.cache.maxSizeMB),
      retentionDays: positive(
        'cache.retentionDays',
        cache.retentionDays,
        base.cache.retentionDays,
      ),
    },
    discovery: {
      enabled: flag('discovery.enabled', discovery.enabled, base.discovery.enabled),
      maxDepth,
      python,
      extraSubmodules: submoduleTable(discovery.extraSubmodules),
      excluded,
    },
  };
}

/**
 * Loads optional `exepack.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 * - Unvalidated: pass the result through `resolveSettings`
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<Record<string, unknown> | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const cfg = isRecord(mod) && 'default' in mod ? mod.default : mod;
  cached = { loaded: true, config: isRecord(cfg) ? cfg : null };
  log.debug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
