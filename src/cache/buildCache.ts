import { cpSync, existsSync, mkdirSync, readdirSync, renameSync, rmSync } from 'fs';
import { join, resolve } from 'path';

import type { CacheEntry, CacheStats } from './cacheTypes.js';
import { CacheStore } from './cacheStore.js';
import { getArtifactPath, METADATA_FILE } from './cachePaths.js';
import { computeSignature } from './hash.js';
import { defaultSettings, type CacheSettings } from '../dx/config.js';
import { createLogger } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { errorMessage, warn } from '../dx/warnings.js';
import { BYTES_PER_MB, pathSizeBytes } from '../utils/fsSize.js';

const log = createLogger('cache');

const DAY_MS = 24 * 60 * 60 * 1000;

// Eviction stops once the total is back under this share of the limit,
// so one small put doesn't immediately trigger the next round.
const EVICTION_TARGET = 0.8;

// A path that is already gone counts as removed.
function removePath(p: string): boolean {
  try {
    rmSync(p, { recursive: true, force: true });
    return true;
  } catch (e) {
    warn({ code: 'CACHE_EVICT_FAILED', message: `cannot remove ${p}: ${errorMessage(e)}` });
    return false;
  }
}

export type BuildCacheOptions = Partial<CacheSettings> & {
  /** Clock used for expiry and cache ids (ms since epoch). */
  now?: () => number;
};

export type CacheSettingsUpdate = Partial<Omit<CacheSettings, 'directory'>>;

/**
 * Content-addressed store of packaged artifacts.
 *
 * Every public method is best-effort: filesystem failures are reported as a
 * warning and turn into a miss / `false`, never an exception.
 */
export class BuildCache {
  private settings: CacheSettings;
  private readonly entries: CacheStore;
  private readonly now: () => number;

  constructor(options: BuildCacheOptions = {}) {
    const { now, ...overrides } = options;
    const defaults = defaultSettings().cache;
    this.settings = {
      enabled: overrides.enabled ?? defaults.enabled,
      directory: resolve(overrides.directory ?? defaults.directory),
      maxSizeMB: overrides.maxSizeMB ?? defaults.maxSizeMB,
      retentionDays: overrides.retentionDays ?? defaults.retentionDays,
    };
    this.now = now ?? Date.now;
    this.entries = new CacheStore(this.settings.directory);
  }

  get directory(): string {
    return this.settings.directory;
  }

  getSettings(): CacheSettings {
    return { ...this.settings };
  }

  updateSettings(update: CacheSettingsUpdate) {
    this.settings = {
      ...this.settings,
      enabled: update.enabled ?? this.settings.enabled,
      maxSizeMB: update.maxSizeMB ?? this.settings.maxSizeMB,
      retentionDays: update.retentionDays ?? this.settings.retentionDays,
    };
  }

  /**
   * Signature of the script as it is on disk right now, or null when it
   * can't be read. Take it before building and hand it to `store` so the
   * artifact is filed under the content it was built from.
   */
  signature(scriptPath: string, invocation: string): string | null {
    try {
      return computeSignature({ scriptPath, invocation });
    } catch (e) {
      warn({
        code: 'SCRIPT_UNREADABLE',
        message: `cannot hash ${scriptPath}: ${errorMessage(e)}`,
      });
      return null;
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    const age = this.now() - entry.storedAt.getTime();
    return age >= this.settings.retentionDays * DAY_MS;
  }

  /** Path of a reusable artifact for this script + invocation, or null. */
  lookup(scriptPath: string, invocation: string): string | null {
    if (!this.settings.enabled) return null;
    const signature = this.signature(scriptPath, invocation);
    return signature ? this.lookupSignature(signature) : null;
  }

  /**
   * Expired entries are reported as a miss but left in place; eviction or
   * the next store for the same signature reclaims them. An entry whose
   * artifact vanished is dropped from the metadata.
   */
  lookupSignature(signature: string): string | null {
    if (!this.settings.enabled) return null;

    const entry = this.entries.get(signature);
    if (!entry) {
      log.debug('cache miss', { signature });
      traceInfo('cache.miss', { signature, reason: 'absent' });
      return null;
    }

    if (this.isExpired(entry)) {
      log.debug('cache expired', { signature, storedAt: entry.storedAt.toISOString() });
      traceInfo('cache.miss', { signature, reason: 'expired' });
      return null;
    }

    const artifact = getArtifactPath(this.directory, entry.cacheId);
    if (!existsSync(artifact)) {
      traceInfo('cache.miss', { signature, reason: 'artifact-missing' });
      try {
        this.entries.delete(signature);
      } catch (e) {
        warn({ code: 'CACHE_WRITE_FAILED', message: `dropping stale entry: ${errorMessage(e)}` });
      }
      return null;
    }

    log.info('cache hit', { signature, artifact });
    traceInfo('cache.hit', { signature, cacheId: entry.cacheId });
    return artifact;
  }

  private mintCacheId(signature: string): string {
    const base = `build_${signature.slice(0, 16)}_${Math.floor(this.now() / 1000)}`;
    let id = base;
    for (let n = 1; existsSync(getArtifactPath(this.directory, id)); n++) {
      id = `${base}_${n}`;
    }
    return id;
  }

  private removeArtifact(entry: CacheEntry): boolean {
    return removePath(getArtifactPath(this.directory, entry.cacheId));
  }

  /**
   * Copy a freshly built artifact (file or directory) into the cache.
   * The caller keeps `outputPath`; nothing is moved out from under it.
   *
   * With `expectedSignature` (taken before the build started) nothing is
   * stored if the script changed while it was being built.
   */
  store(
    scriptPath: string,
    invocation: string,
    outputPath: string,
    expectedSignature?: string,
  ): boolean {
    if (!this.settings.enabled) return false;
    if (!existsSync(outputPath)) {
      log.debug('nothing to cache', { outputPath });
      return false;
    }

    const signature = this.signature(scriptPath, invocation);
    if (!signature) return false;
    if (expectedSignature !== undefined && expectedSignature !== signature) {
      log.info('script changed during the build, not caching', { scriptPath });
      return false;
    }

    const cacheId = this.mintCacheId(signature);
    const artifact = getArtifactPath(this.directory, cacheId);
    const partial = `${artifact}.partial`;
    let sizeBytes: number;

    try {
      mkdirSync(this.directory, { recursive: true });
      rmSync(partial, { recursive: true, force: true });
      cpSync(outputPath, partial, { recursive: true });
      renameSync(partial, artifact);
      sizeBytes = pathSizeBytes(artifact);
    } catch (e) {
      removePath(partial);
      removePath(artifact);
      warn({
        code: 'CACHE_WRITE_FAILED',
        message: `cannot copy ${outputPath} into the cache: ${errorMessage(e)}`,
      });
      return false;
    }

    const previous = this.entries.get(signature);
    const entry: CacheEntry = {
      signature,
      cacheId,
      storedAt: new Date(this.now()),
      sourcePath: resolve(scriptPath),
      invocation,
      sizeBytes,
    };

    try {
      this.entries.set(entry);
    } catch (e) {
      removePath(artifact);
      warn({
        code: 'CACHE_WRITE_FAILED',
        message: `cannot persist cache metadata: ${errorMessage(e)}`,
      });
      return false;
    }

    if (previous && previous.cacheId !== cacheId) this.removeArtifact(previous);

    log.info('build cached', { cacheId, sizeBytes });
    traceInfo('cache.store', { signature, cacheId, sizeBytes });
    this.evict();
    return true;
  }

  /**
   * Remove whatever sits in the cache directory without a metadata record:
   * `.partial` copies from an interrupted store, artifacts whose record was
   * never written or was dropped on load. Returns how many were removed.
   */
  private sweepOrphans(): number {
    let names: string[];
    try {
      names = readdirSync(this.directory);
    } catch (e) {
      log.debug('cannot list cache directory', { error: errorMessage(e) });
      return 0;
    }

    const live = new Set(this.entries.values().map((e) => e.cacheId));
    let removed = 0;
    for (const name of names) {
      // The metadata file and its in-flight temp copies.
      if (name === METADATA_FILE || name.startsWith(`${METADATA_FILE}.`)) continue;
      if (live.has(name)) continue;
      if (removePath(join(this.directory, name))) removed++;
    }

    if (removed) {
      log.info('removed orphaned cache files', { removed });
      traceInfo('cache.sweep', { removed });
    }
    return removed;
  }

  /**
   * Reclaim orphaned files, then drop the oldest entries while the retained
   * total is over the limit. Returns how many entries were removed.
   */
  evict(): number {
    this.sweepOrphans();

    const maxBytes = this.settings.maxSizeMB * BYTES_PER_MB;
    let total = this.entries.totalBytes();
    if (total <= maxBytes) return 0;

    const target = maxBytes * EVICTION_TARGET;
    const oldestFirst = this.entries
      .values()
      .sort((a, b) => a.storedAt.getTime() - b.storedAt.getTime());

    const removed: string[] = [];
    for (const entry of oldestFirst) {
      if (total <= target) break;
      if (!this.removeArtifact(entry)) continue;
      removed.push(entry.signature);
      total -= entry.sizeBytes;
    }

    try {
      this.entries.deleteMany(removed);
    } catch (e) {
      warn({ code: 'CACHE_EVICT_FAILED', message: `cannot persist eviction: ${errorMessage(e)}` });
    }

    log.info('cache eviction', { removed: removed.length, totalBytes: total });
    traceInfo('cache.evict', { removed: removed.length, totalBytes: total });
    return removed.length;
  }

  /** Remove every artifact and reset the metadata. */
  clear(): boolean {
    try {
      rmSync(this.directory, { recursive: true, force: true });
      this.entries.clear();
      log.info('build cache cleared', { directory: this.directory });
      return true;
    } catch (e) {
      warn({ code: 'CACHE_WRITE_FAILED', message: `cannot clear cache: ${errorMessage(e)}` });
      return false;
    }
  }

  stats(): CacheStats {
    return {
      entryCount: this.entries.size,
      totalSizeMB: Math.round((this.entries.totalBytes() / BYTES_PER_MB) * 100) / 100,
      maxSizeMB: this.settings.maxSizeMB,
      retentionDays: this.settings.retentionDays,
      cacheDirectory: this.directory,
    };
  }
}
