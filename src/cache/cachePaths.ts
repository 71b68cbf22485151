import { homedir } from 'os';
import { join } from 'path';

export const METADATA_FILE = 'cache_metadata.json';

function homeDir(): string {
  // Respect HOME when set (important for tests/sandboxes/containers).
  // Fallback to OS homedir() if HOME isn't present.
  return process.env.HOME ?? homedir();
}

export function getCacheRoot(): string {
  return join(homeDir(), '.exepack', 'cache');
}

export function getArtifactPath(root: string, cacheId: string): string {
  return join(root, cacheId);
}

export function getMetadataPath(root: string): string {
  return join(root, METADATA_FILE);
}

// cacheIds end up in rm -r calls; never let a hand-edited metadata file
// point outside the cache root.
export function isSafeCacheId(cacheId: string): boolean {
  return /^[A-Za-z0-9_.-]+$/.test(cacheId) && cacheId !== '.' && cacheId !== '..';
}
