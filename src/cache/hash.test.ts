import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtempSync, statSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { computeSignature, hashFile } from './hash.js';

function sha256(s: string | Buffer) {
  return createHash('sha256').update(s).digest('hex');
}

describe('hash', () => {
  it('hashes file bytes, including files larger than one chunk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'exepack-hash-'));
    const big = Buffer.alloc(200 * 1024, 3);
    writeFileSync(join(dir, 'big.bin'), big);
    expect(hashFile(join(dir, 'big.bin'))).toBe(sha256(big));
  });

  it('combines content hash, mtime and invocation', () => {
    const dir = mkdtempSync(join(tmpdir(), 'exepack-hash-'));
    const script = join(dir, 'app.py');
    writeFileSync(script, 'print("hi")\n');
    utimesSync(script, 1_700_000_000, 1_700_000_000);

    const mtime = statSync(script).mtimeMs / 1000;
    const expected = sha256(`${sha256('print("hi")\n')}:${mtime}:pyinstaller app.py`);
    expect(computeSignature({ scriptPath: script, invocation: 'pyinstaller app.py' })).toBe(expected);
  });

  it('changes when only the modification time changes', () => {
    const dir = mkdtempSync(join(tmpdir(), 'exepack-hash-'));
    const script = join(dir, 'app.py');
    writeFileSync(script, 'x = 1\n');
    utimesSync(script, 1_700_000_000, 1_700_000_000);
    const before = computeSignature({ scriptPath: script, invocation: 'cmd' });
    utimesSync(script, 1_700_000_100, 1_700_000_100);
    expect(computeSignature({ scriptPath: script, invocation: 'cmd' })).not.toBe(before);
  });

  it('throws for a missing script', () => {
    expect(() =>
      computeSignature({ scriptPath: join(tmpdir(), 'exepack-nope', 'x.py'), invocation: 'cmd' }),
    ).toThrow();
  });
});
