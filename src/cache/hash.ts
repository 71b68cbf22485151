import { closeSync, openSync, readSync, statSync } from 'fs';
import crypto from 'crypto';

const CHUNK_SIZE = 64 * 1024;

type SignatureInput = {
  scriptPath: string;
  invocation: string;
};

/** sha256 of a file's bytes, read in chunks. Throws if the file can't be read. */
export function hashFile(filePath: string): string {
  const hash = crypto.createHash('sha256');
  const fd = openSync(filePath, 'r');
  try {
    const buf = Buffer.alloc(CHUNK_SIZE);
    let n = readSync(fd, buf, 0, CHUNK_SIZE, null);
    while (n > 0) {
      hash.update(buf.subarray(0, n));
      n = readSync(fd, buf, 0, CHUNK_SIZE, null);
    }
  } finally {
    closeSync(fd);
  }
  return hash.digest('hex');
}

export function computeSignature(input: SignatureInput): string {
  const scriptHash = hashFile(input.scriptPath);
  // Seconds with fractional part, same resolution the filesystem reports.
  const mtime = statSync(input.scriptPath).mtimeMs / 1000;

  const hash = crypto.createHash('sha256');
  hash.update(`${scriptHash}:${mtime}:${input.invocation}`);
  return hash.digest('hex');
}
