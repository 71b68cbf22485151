import { readdirSync, statSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';

import { parsePythonFile, topLevelName } from '../parser/index.js';
import { expandKnownSubmodules } from './heuristics.js';
import { acceptAllResolver, SitePackagesResolver, type ModuleResolver } from './moduleResolver.js';
import { probePythonEnvironment, type CommandRunner } from './pythonEnv.js';
import { bundledStdlibNames, EXCLUDED_NAMES } from './stdlib.js';
import { defaultSettings, type DiscoverySettings } from '../dx/config.js';
import { createLogger } from '../dx/logger.js';
import { traceDebug, traceInfo } from '../dx/trace.js';
import { errorMessage, warn } from '../dx/warnings.js';

const log = createLogger('discovery');

/** Working state of one discovery call. Never reused. */
type ImportSet = {
  discovered: Set<string>;
  visited: Set<string>;
  listings: Map<string, string[]>;
};

export type DiscoveryReport = {
  /** Names to pass to the packaging engine, sorted. */
  modules: string[];
  /** Absolute paths of the files that were scanned, in visit order. */
  visited: string[];
  dropped: {
    stdlib: string[];
    excluded: string[];
    unresolved: string[];
  };
};

export type ImportDiscovererOptions = Partial<Omit<DiscoverySettings, 'python'>> & {
  resolver?: ModuleResolver;
  /** Standard library names to filter out. Defaults to the bundled list. */
  stdlib?: Iterable<string>;
};

export type DiscoverySettingsUpdate = Partial<
  Pick<DiscoverySettings, 'enabled' | 'maxDepth' | 'extraSubmodules' | 'excluded'>
>;

function emptyReport(): DiscoveryReport {
  return { modules: [], visited: [], dropped: { stdlib: [], excluded: [], unresolved: [] } };
}

function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Predicts modules a script needs at run time that a packaging tool's own
 * analysis of the entry file misses.
 *
 * The entry script is depth 0. Every other `.py` file in the same directory
 * is one hop away from any file it sits next to; files more than `maxDepth`
 * hops away are not scanned.
 */
export class ImportDiscoverer {
  private settings: Omit<DiscoverySettings, 'python'>;
  private readonly resolver: ModuleResolver;
  private readonly stdlib: Set<string>;

  constructor(options: ImportDiscovererOptions = {}) {
    const defaults = defaultSettings().discovery;
    this.settings = {
      enabled: options.enabled ?? defaults.enabled,
      maxDepth: options.maxDepth ?? defaults.maxDepth,
      extraSubmodules: options.extraSubmodules ?? defaults.extraSubmodules,
      excluded: options.excluded ?? defaults.excluded,
    };
    this.resolver = options.resolver ?? acceptAllResolver;
    this.stdlib = new Set(options.stdlib ?? bundledStdlibNames());
  }

  getSettings(): Omit<DiscoverySettings, 'python'> {
    return { ...this.settings };
  }

  updateSettings(update: DiscoverySettingsUpdate) {
    this.settings = {
      enabled: update.enabled ?? this.settings.enabled,
      maxDepth: update.maxDepth ?? this.settings.maxDepth,
      extraSubmodules: update.extraSubmodules ?? this.settings.extraSubmodules,
      excluded: update.excluded ?? this.settings.excluded,
    };
  }

  /** Sorted module names to force-include. Never throws. */
  discover(scriptPath: string): string[] {
    return this.discoverWithReport(scriptPath).modules;
  }

  discoverWithReport(scriptPath: string): DiscoveryReport {
    if (!this.settings.enabled) return emptyReport();
    try {
      return this.run(resolve(scriptPath));
    } catch (e) {
      warn({
        code: 'DISCOVERY_FAILED',
        message: `import discovery for ${scriptPath} failed: ${errorMessage(e)}`,
      });
      return emptyReport();
    }
  }

  private run(entry: string): DiscoveryReport {
    if (extname(entry) !== '.py' || !isFile(entry)) {
      log.debug('not a python script, skipping discovery', { entry });
      return emptyReport();
    }

    const state: ImportSet = { discovered: new Set(), visited: new Set(), listings: new Map() };
    this.walk(entry, state);

    for (const sub of expandKnownSubmodules(state.discovered, this.settings.extraSubmodules)) {
      state.discovered.add(sub);
    }

    const report = this.filter(state.discovered);
    report.visited = [...state.visited];
    log.info(`discovered ${report.modules.length} hidden imports`, report.modules);
    traceInfo('discovery.done', {
      entry,
      visited: report.visited.length,
      modules: report.modules.length,
    });
    return report;
  }

  private walk(entry: string, state: ImportSet) {
    // Paths are marked visited when queued so each file is scanned once.
    const queue: Array<{ file: string; depth: number }> = [{ file: entry, depth: 0 }];
    state.visited.add(entry);

    for (let i = 0; i < queue.length; i++) {
      const { file, depth } = queue[i];
      this.scanFile(file, state);
      if (depth >= this.settings.maxDepth) continue;

      for (const sibling of this.siblings(file, state)) {
        if (state.visited.has(sibling)) continue;
        state.visited.add(sibling);
        queue.push({ file: sibling, depth: depth + 1 });
      }
    }
  }

  private siblings(file: string, state: ImportSet): string[] {
    const dir = dirname(file);
    let files = state.listings.get(dir);
    if (!files) {
      try {
        files = readdirSync(dir, { withFileTypes: true })
          .filter((d) => d.isFile() && d.name.endsWith('.py'))
          .map((d) => join(dir, d.name))
          .sort();
      } catch (e) {
        warn({ code: 'DISCOVERY_FILE_SKIPPED', message: `cannot list ${dir}: ${errorMessage(e)}` });
        files = [];
      }
      state.listings.set(dir, files);
    }
    return files;
  }

  private scanFile(file: string, state: ImportSet) {
    try {
      const { imports, method } = parsePythonFile(file);
      for (const imp of imports) state.discovered.add(topLevelName(imp.module));
      traceDebug('discovery.scan', { file, method, imports: imports.length });
    } catch (e) {
      warn({ code: 'DISCOVERY_FILE_SKIPPED', message: `cannot scan ${file}: ${errorMessage(e)}` });
    }
  }

  private resolves(name: string): boolean {
    try {
      return this.resolver.canResolve(name);
    } catch (e) {
      log.debug('resolver failed', { name, error: errorMessage(e) });
      return false;
    }
  }

  private filter(names: Set<string>): DiscoveryReport {
    const report = emptyReport();
    const excluded = new Set([...EXCLUDED_NAMES, ...this.settings.excluded]);

    for (const name of [...names].sort()) {
      if (this.stdlib.has(name)) report.dropped.stdlib.push(name);
      else if (excluded.has(name)) report.dropped.excluded.push(name);
      else if (!this.resolves(name)) report.dropped.unresolved.push(name);
      else report.modules.push(name);
    }
    return report;
  }
}

export type CreateDiscovererOptions = {
  settings?: DiscoverySettings;
  /** Skip the interpreter probe and keep every non-stdlib name. */
  verify?: boolean;
  run?: CommandRunner;
};

/**
 * Build a discoverer that checks names against a real interpreter's search
 * path. Falls back to the bundled stdlib list and no resolution check when
 * the interpreter can't be probed.
 */
export function createImportDiscoverer(options: CreateDiscovererOptions = {}): ImportDiscoverer {
  const { python, ...settings } = options.settings ?? defaultSettings().discovery;
  if (options.verify === false || !settings.enabled) return new ImportDiscoverer(settings);

  const env = probePythonEnvironment(python, options.run);
  if (!env) {
    warn({
      code: 'DISCOVERY_FAILED',
      message: `cannot probe ${python}; discovered names will not be verified`,
      hint: 'set discovery.python in exepack.config.js',
    });
    return new ImportDiscoverer(settings);
  }

  return new ImportDiscoverer({
    ...settings,
    resolver: new SitePackagesResolver(env.searchPaths),
    stdlib: [...bundledStdlibNames(), ...env.stdlib],
  });
}
