import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';

import type { CacheEntry, PersistedCacheEntry } from './cacheTypes.js';
import { getMetadataPath, isSafeCacheId } from './cachePaths.js';
import { BYTES_PER_MB } from '../utils/fsSize.js';
import { errorMessage, warn } from '../dx/warnings.js';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toEntry(signature: string, raw: unknown): CacheEntry | null {
  if (!isRecord(raw)) return null;
  const { cacheId, storedAt, sourcePath, invocation, sizeMB } = raw;
  if (typeof cacheId !== 'string' || !isSafeCacheId(cacheId)) return null;
  if (typeof storedAt !== 'string') return null;
  const at = new Date(storedAt);
  if (Number.isNaN(at.getTime())) return null;

  return {
    signature,
    cacheId,
    storedAt: at,
    sourcePath: typeof sourcePath === 'string' ? sourcePath : '',
    invocation: typeof invocation === 'string' ? invocation : '',
    sizeBytes:
      typeof sizeMB === 'number' && Number.isFinite(sizeMB) && sizeMB > 0
        ? Math.round(sizeMB * BYTES_PER_MB)
        : 0,
  };
}

/**
 * Parse a metadata document. Records that can't be used are dropped;
 * unknown fields on usable records are ignored.
 */
export function parseMetadata(raw: string): Map<string, CacheEntry> {
  const entries = new Map<string, CacheEntry>();
  const doc: unknown = JSON.parse(raw);
  if (!isRecord(doc)) return entries;
  for (const [signature, value] of Object.entries(doc)) {
    const entry = toEntry(signature, value);
    if (entry) entries.set(signature, entry);
  }
  return entries;
}

export function serializeMetadata(entries: Iterable<CacheEntry>): string {
  const doc: Record<string, PersistedCacheEntry> = {};
  for (const e of entries) {
    doc[e.signature] = {
      cacheId: e.cacheId,
      storedAt: e.storedAt.toISOString(),
      sourcePath: e.sourcePath,
      invocation: e.invocation,
      sizeMB: e.sizeBytes / BYTES_PER_MB,
    };
  }
  return JSON.stringify(doc, null, 2) + '\n';
}

/**
 * Signature -> entry map backed by a single JSON document.
 *
 * The document is read once when the store is created and rewritten whole
 * after every mutation. A mutation only becomes visible in memory after the
 * write succeeded, so a failed write leaves both copies as they were.
 */
export class CacheStore {
  private entries: Map<string, CacheEntry>;
  readonly metadataPath: string;

  constructor(readonly root: string) {
    this.metadataPath = getMetadataPath(root);
    this.entries = this.load();
  }

  private load(): Map<string, CacheEntry> {
    if (!existsSync(this.metadataPath)) return new Map();
    try {
      return parseMetadata(readFileSync(this.metadataPath, 'utf8'));
    } catch (e) {
      warn({
        code: 'CACHE_METADATA_UNREADABLE',
        message: `${this.metadataPath}: ${errorMessage(e)}`,
        hint: 'starting with an empty cache',
      });
      return new Map();
    }
  }

  private commit(next: Map<string, CacheEntry>) {
    mkdirSync(this.root, { recursive: true });
    const tmp = `${this.metadataPath}.${process.pid}.tmp`;
    writeFileSync(tmp, serializeMetadata(next.values()));
    renameSync(tmp, this.metadataPath);
    this.entries = next;
  }

  get size(): number {
    return this.entries.size;
  }

  get(signature: string): CacheEntry | undefined {
    return this.entries.get(signature);
  }

  values(): CacheEntry[] {
    return [...this.entries.values()];
  }

  totalBytes(): number {
    let total = 0;
    for (const e of this.entries.values()) total += e.sizeBytes;
    return total;
  }

  set(entry: CacheEntry) {
    const next = new Map(this.entries);
    next.set(entry.signature, entry);
    this.commit(next);
  }

  delete(signature: string) {
    this.deleteMany([signature]);
  }

  deleteMany(signatures: string[]) {
    const next = new Map(this.entries);
    let changed = false;
    for (const s of signatures) changed = next.delete(s) || changed;
    if (changed) this.commit(next);
  }

  clear() {
    this.commit(new Map());
  }
}
