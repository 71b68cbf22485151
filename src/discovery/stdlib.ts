import { readFileSync } from 'node:fs';

// Names that are never worth a hidden-import flag even though they are not
// regular third-party modules.
export const EXCLUDED_NAMES: readonly string[] = ['__future__', '__main__', 'typing'];

const BUNDLED_STDLIB = new URL('../../data/python-stdlib.json', import.meta.url);

let bundled: Set<string> | null = null;

/**
 * Standard library and built-in module names shipped with exepack, used when
 * no interpreter can be asked for its own list.
 */
export function bundledStdlibNames(): Set<string> {
  if (bundled) return bundled;
  const doc: unknown = JSON.parse(readFileSync(BUNDLED_STDLIB, 'utf8'));
  const modules =
    typeof doc === 'object' && doc !== null && 'modules' in doc && Array.isArray(doc.modules)
      ? doc.modules.filter((m): m is string => typeof m === 'string')
      : [];
  bundled = new Set(modules);
  return bundled;
}
