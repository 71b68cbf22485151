import { readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const EXTENSION_MODULE = /\.(so|pyd)$/;

/**
 * Answers whether a dotted module name exists in the target environment.
 * Implementations must not execute the module.
 */
export interface ModuleResolver {
  canResolve(moduleName: string): boolean;
}

/** For callers with no environment to consult: every name is kept. */
export const acceptAllResolver: ModuleResolver = {
  canResolve: () => true,
};

function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves modules by looking at the files an interpreter would import them
 * from: packages (with or without `__init__.py`), `.py` modules and compiled
 * extension modules, under each search path in order.
 */
export class SitePackagesResolver implements ModuleResolver {
  private readonly listings = new Map<string, string[]>();

  constructor(readonly searchPaths: readonly string[]) {}

  private list(dir: string): string[] {
    let names = this.listings.get(dir);
    if (!names) {
      try {
        names = readdirSync(dir);
      } catch {
        names = [];
      }
      this.listings.set(dir, names);
    }
    return names;
  }

  private existsUnder(root: string, parts: string[]): boolean {
    const leaf = parts[parts.length - 1];
    const dir = join(root, ...parts.slice(0, -1));
    if (isDirectory(join(dir, leaf))) return true;
    if (isFile(join(dir, `${leaf}.py`))) return true;
    return this.list(dir).some((f) => f.startsWith(`${leaf}.`) && EXTENSION_MODULE.test(f));
  }

  canResolve(moduleName: string): boolean {
    const parts = moduleName.split('.');
    if (!parts.every((p) => IDENTIFIER.test(p))) return false;
    return this.searchPaths.some((root) => this.existsUnder(root, parts));
  }
}
