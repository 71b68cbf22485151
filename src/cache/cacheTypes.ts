export type CacheEntry = {
  /** sha256 over script hash, script mtime and the full invocation. Lookup key. */
  signature: string;
  /** Directory name of the stored artifact under the cache root. */
  cacheId: string;
  storedAt: Date;
  sourcePath: string;
  invocation: string;
  sizeBytes: number;
};

/**
 * On-disk shape of one record in `cache_metadata.json`, keyed by signature.
 * Readers ignore fields they don't know about.
 */
export type PersistedCacheEntry = {
  cacheId: string;
  /** ISO-8601 */
  storedAt: string;
  sourcePath: string;
  invocation: string;
  sizeMB: number;
};

export type CacheStats = {
  entryCount: number;
  totalSizeMB: number;
  maxSizeMB: number;
  retentionDays: number;
  cacheDirectory: string;
};
