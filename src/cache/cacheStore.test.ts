import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CacheStore, parseMetadata, serializeMetadata } from './cacheStore.js';
import { METADATA_FILE } from './cachePaths.js';
import type { CacheEntry } from './cacheTypes.js';

function entry(signature: string, cacheId: string, iso: string): CacheEntry {
  return {
    signature,
    cacheId,
    storedAt: new Date(iso),
    sourcePath: '/work/app.py',
    invocation: 'pyinstaller app.py',
    sizeBytes: 1024 * 1024,
  };
}

describe('metadata document', () => {
  it('writes the documented record layout', () => {
    const doc = JSON.parse(serializeMetadata([entry('sig1', 'build_a_1', '2026-01-01T00:00:00.000Z')]));
    expect(doc).toEqual({
      sig1: {
        cacheId: 'build_a_1',
        storedAt: '2026-01-01T00:00:00.000Z',
        sourcePath: '/work/app.py',
        invocation: 'pyinstaller app.py',
        sizeMB: 1,
      },
    });
  });

  it('ignores unknown fields and drops unusable records', () => {
    const parsed = parseMetadata(
      JSON.stringify({
        good: {
          cacheId: 'build_good_1',
          storedAt: '2026-02-03T04:05:06.000Z',
          sourcePath: 'a.py',
          invocation: 'x',
          sizeMB: 0.5,
          compression: 'zstd',
        },
        noId: { storedAt: '2026-02-03T04:05:06.000Z', sizeMB: 1 },
        badDate: { cacheId: 'build_bad_1', storedAt: 'yesterday', sizeMB: 1 },
        escape: { cacheId: '..', storedAt: '2026-02-03T04:05:06.000Z', sizeMB: 1 },
        nested: { cacheId: '../outside', storedAt: '2026-02-03T04:05:06.000Z', sizeMB: 1 },
      }),
    );

    expect([...parsed.keys()]).toEqual(['good']);
    expect(parsed.get('good')).toEqual({
      signature: 'good',
      cacheId: 'build_good_1',
      storedAt: new Date('2026-02-03T04:05:06.000Z'),
      sourcePath: 'a.py',
      invocation: 'x',
      sizeBytes: 524288,
    });
  });

  it('treats a missing size as zero', () => {
    const parsed = parseMetadata(
      JSON.stringify({ s: { cacheId: 'build_s_1', storedAt: '2026-01-01T00:00:00Z' } }),
    );
    expect(parsed.get('s')?.sizeBytes).toBe(0);
  });
});

describe('CacheStore', () => {
  it('starts empty when the document is absent', () => {
    const root = join(mkdtempSync(join(tmpdir(), 'exepack-store-')), 'cache');
    const store = new CacheStore(root);
    expect(store.size).toBe(0);
  });

  it('starts empty when the document is corrupt', () => {
    const root = mkdtempSync(join(tmpdir(), 'exepack-store-'));
    writeFileSync(join(root, METADATA_FILE), '{ not json');
    expect(new CacheStore(root).size).toBe(0);
  });

  it('rewrites the whole document after each mutation', () => {
    const root = mkdtempSync(join(tmpdir(), 'exepack-store-'));
    const store = new CacheStore(root);
    store.set(entry('a', 'build_a_1', '2026-01-01T00:00:00Z'));
    store.set(entry('b', 'build_b_1', '2026-01-02T00:00:00Z'));
    store.delete('a');

    const doc = JSON.parse(readFileSync(join(root, METADATA_FILE), 'utf8'));
    expect(Object.keys(doc)).toEqual(['b']);
    expect(new CacheStore(root).get('b')?.cacheId).toBe('build_b_1');
    expect(store.totalBytes()).toBe(1024 * 1024);
  });

  it('keeps memory unchanged when the write fails', () => {
    const dir = mkdtempSync(join(tmpdir(), 'exepack-store-'));
    const root = join(dir, 'blocked');
    // A file where the cache directory should be makes every write fail.
    writeFileSync(root, 'not a directory');

    const store = new CacheStore(root);
    expect(() => store.set(entry('a', 'build_a_1', '2026-01-01T00:00:00Z'))).toThrow();
    expect(store.size).toBe(0);
  });
});
