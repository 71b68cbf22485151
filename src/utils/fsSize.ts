import { lstatSync, readdirSync, type Dirent, type Stats } from 'node:fs';
import { join } from 'node:path';

export const BYTES_PER_MB = 1024 * 1024;

/**
 * Total size in bytes of a file or directory tree.
 * Symlinks are not followed. Anything that can't be stat'ed or listed
 * (missing, vanished mid-walk, unreadable) counts as 0.
 */
export function pathSizeBytes(p: string): number {
  let st: Stats;
  try {
    st = lstatSync(p);
  } catch {
    return 0;
  }
  if (st.isFile()) return st.size;
  if (!st.isDirectory()) return 0;

  let children: Dirent[];
  try {
    children = readdirSync(p, { withFileTypes: true });
  } catch {
    return 0;
  }

  let bytes = 0;
  for (const ent of children) bytes += pathSizeBytes(join(p, ent.name));
  return bytes;
}

export function humanBytes(bytes: number) {
  const u = ['B', 'KB', 'MB', 'GB'];
  let b = bytes;
  let i = 0;
  while (b >= 1024 && i < u.length - 1) {
    b /= 1024;
    i++;
  }
  return `${b.toFixed(i === 0 ? 0 : 1)} ${u[i]}`;
}
