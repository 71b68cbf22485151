import { execFileSync } from 'node:child_process';

import { createLogger } from '../dx/logger.js';
import { errorMessage } from '../dx/warnings.js';

const log = createLogger('discovery');

export type PythonEnvironment = {
  executable: string;
  version: string;
  /** stdlib + built-in module names as reported by the interpreter. */
  stdlib: Set<string>;
  /** Non-empty `sys.path` entries, in import order. */
  searchPaths: string[];
};

export type CommandRunner = (command: string, args: string[]) => string;

// Prints metadata only; nothing beyond json and sys is imported.
const PROBE = [
  'import json, sys',
  'print(json.dumps({',
  '  "version": "%d.%d.%d" % sys.version_info[:3],',
  '  "stdlib": sorted(getattr(sys, "stdlib_module_names", ())),',
  '  "builtin": sorted(sys.builtin_module_names),',
  '  "path": [p for p in sys.path if p],',
  '}))',
].join('\n');

const runCommand: CommandRunner = (command, args) =>
  execFileSync(command, args, {
    encoding: 'utf8',
    timeout: 15_000,
    stdio: ['ignore', 'pipe', 'ignore'],
  });

function stringList(v: unknown): string[] | null {
  if (!Array.isArray(v)) return null;
  return v.filter((s): s is string => typeof s === 'string');
}

export function parseProbeOutput(executable: string, output: string): PythonEnvironment | null {
  let doc: unknown;
  try {
    doc = JSON.parse(output.trim());
  } catch {
    return null;
  }
  if (typeof doc !== 'object' || doc === null) return null;

  const version = 'version' in doc && typeof doc.version === 'string' ? doc.version : null;
  const stdlib = 'stdlib' in doc ? stringList(doc.stdlib) : null;
  const builtin = 'builtin' in doc ? stringList(doc.builtin) : null;
  const path = 'path' in doc ? stringList(doc.path) : null;
  if (!version || !stdlib || !builtin || !path) return null;

  return {
    executable,
    version,
    stdlib: new Set([...stdlib, ...builtin]),
    searchPaths: path,
  };
}

/**
 * Ask an interpreter for its module names and search path.
 * Returns null when it can't be run or answers with something unexpected.
 */
export function probePythonEnvironment(
  python: string,
  run: CommandRunner = runCommand,
): PythonEnvironment | null {
  try {
    const env = parseProbeOutput(python, run(python, ['-c', PROBE]));
    if (!env) log.debug('unexpected interpreter probe output', { python });
    return env;
  } catch (e) {
    log.debug('python probe failed', { python, error: errorMessage(e) });
    return null;
  }
}
