import { cpSync, mkdirSync, readdirSync, statSync } from 'fs';
import { basename, join } from 'path';

import type { BuildCache } from '../cache/buildCache.js';
import type { ImportDiscoverer } from '../discovery/importDiscoverer.js';
import type { PackageRequest, PackageResult, PackagingEngine } from './packagingTypes.js';
import { createLogger } from '../dx/logger.js';
import { errorMessage, warn } from '../dx/warnings.js';

const log = createLogger('packaging');

export type PackageDeps = {
  engine: PackagingEngine;
  cache?: BuildCache;
  discoverer?: ImportDiscoverer;
};

export function hiddenImportArgs(modules: string[]): string[] {
  return modules.flatMap((m) => ['--hidden-import', m]);
}

/** First positional `.py` argument, which is how engines take the entry script. */
export function extractScriptPath(args: string[]): string | null {
  return args.find((a) => !a.startsWith('-') && a.endsWith('.py')) ?? null;
}

// A directory artifact is merged into outputDir entry by entry; a single
// file lands next to whatever is already there.
function deliver(artifact: string, outputDir: string) {
  mkdirSync(outputDir, { recursive: true });
  if (!statSync(artifact).isDirectory()) {
    cpSync(artifact, join(outputDir, basename(artifact)), { force: true });
    return;
  }
  for (const name of readdirSync(artifact)) {
    cpSync(join(artifact, name), join(outputDir, name), { recursive: true, force: true });
  }
}

/**
 * Package a script, reusing a cached artifact when the script and the
 * user's arguments are unchanged.
 *
 * The cache key is the invocation *before* discovered imports are appended,
 * so the same request looks up and stores under the same signature. The
 * signature is taken once, before the build; if the script is edited while
 * the engine runs, the result is delivered but not cached.
 * Engine failures reject; cache and discovery problems never do.
 */
export async function packageWithCache(
  request: PackageRequest,
  deps: PackageDeps,
): Promise<PackageResult> {
  const { engine, cache, discoverer } = deps;
  const { scriptPath, outputDir } = request;
  const invocation = request.args.join(' ');

  const signature =
    cache && cache.getSettings().enabled ? cache.signature(scriptPath, invocation) : null;
  const cachedArtifact = cache && signature ? cache.lookupSignature(signature) : null;
  if (cachedArtifact) {
    try {
      deliver(cachedArtifact, outputDir);
      log.info('using cached build, skipping engine', { outputDir });
      return { cached: true, outputDir, hiddenImports: [], stored: false };
    } catch (e) {
      warn({
        code: 'CACHE_WRITE_FAILED',
        message: `cannot deliver cached build: ${errorMessage(e)}`,
        hint: 'building from scratch instead',
      });
    }
  }

  const hiddenImports = discoverer?.discover(scriptPath) ?? [];
  if (hiddenImports.length) log.debug('adding hidden imports', hiddenImports);

  const produced = await engine.build({
    scriptPath,
    args: [...request.args, ...hiddenImportArgs(hiddenImports)],
    distPath: request.distPath,
  });

  deliver(produced, outputDir);
  log.info('build delivered', { outputDir });
  const stored =
    cache && signature ? cache.store(scriptPath, invocation, produced, signature) : false;
  return { cached: false, outputDir, hiddenImports, stored };
}
