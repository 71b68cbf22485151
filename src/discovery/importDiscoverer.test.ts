import { describe, it, expect, beforeEach } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createImportDiscoverer, ImportDiscoverer } from './importDiscoverer.js';
import type { ModuleResolver } from './moduleResolver.js';
import { bundledStdlibNames } from './stdlib.js';
import { defaultSettings } from '../dx/config.js';

let dir: string;

function write(name: string, source: string) {
  const p = join(dir, name);
  writeFileSync(p, source);
  return p;
}

function onlyThese(...names: string[]): ModuleResolver {
  const known = new Set(names);
  return { canResolve: (n) => known.has(n) };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'exepack-discover-'));
});

describe('ImportDiscoverer', () => {
  it('reports numpy and its commonly missed submodules', () => {
    const app = write('app.py', 'import os\nimport numpy as np\n\nprint(np.zeros(2), os.sep)\n');
    const discoverer = new ImportDiscoverer({ resolver: onlyThese('numpy', 'numpy.core', 'numpy.lib') });
    expect(discoverer.discover(app)).toEqual(['numpy', 'numpy.core', 'numpy.lib']);
  });

  it('scans sibling files but not subdirectories', () => {
    const app = write('app.py', 'import requests\n');
    write('helpers.py', 'import yaml\nfrom flask import Flask\n');
    mkdirSync(join(dir, 'pkg'));
    writeFileSync(join(dir, 'pkg', 'deep.py'), 'import django\n');
    write('notes.txt', 'import not_python\n');

    expect(new ImportDiscoverer().discover(app)).toEqual(['flask', 'requests', 'yaml']);
  });

  it('scans only the entry file at depth 0', () => {
    const app = write('app.py', 'import requests\n');
    write('helpers.py', 'import yaml\n');
    expect(new ImportDiscoverer({ maxDepth: 0 }).discover(app)).toEqual(['requests']);
  });

  it('visits each file once when siblings import each other', () => {
    const names = ['a', 'b', 'c', 'd', 'e'];
    for (const n of names) {
      const others = names.filter((o) => o !== n).join(', ');
      write(`${n}.py`, `import ${others}\nimport lib_${n}\n`);
    }

    const report = new ImportDiscoverer({ resolver: { canResolve: (n) => n.startsWith('lib_') } })
      .discoverWithReport(join(dir, 'a.py'));

    expect(report.visited).toHaveLength(5);
    expect(new Set(report.visited).size).toBe(5);
    expect(report.visited[0]).toBe(join(dir, 'a.py'));
    expect(report.modules).toEqual(['lib_a', 'lib_b', 'lib_c', 'lib_d', 'lib_e']);
    expect(report.dropped.unresolved).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('drops standard library, excluded and unresolvable names', () => {
    const app = write(
      'app.py',
      ['import os, sys, json', 'import typing', 'import setuptools', 'import requests', 'import ghostpkg', ''].join('\n'),
    );
    const report = new ImportDiscoverer({
      excluded: ['setuptools'],
      resolver: onlyThese('requests', 'setuptools'),
    }).discoverWithReport(app);

    expect(report.modules).toEqual(['requests']);
    expect(report.dropped).toEqual({
      stdlib: ['json', 'os', 'sys', 'typing'],
      excluded: ['setuptools'],
      unresolved: ['ghostpkg'],
    });
  });

  it('never returns a standard library name', () => {
    const app = write(
      'app.py',
      'import asyncio, sqlite3, collections.abc, xml.dom\nfrom email import message\nimport attrs\n',
    );
    const found = new ImportDiscoverer().discover(app);
    const stdlib = bundledStdlibNames();
    expect(found.some((n) => stdlib.has(n))).toBe(false);
    expect(found).toEqual(['attrs']);
  });

  it('adds tkinter submodules even though tkinter itself is filtered', () => {
    const app = write('gui.py', 'import tkinter as tk\n');
    expect(new ImportDiscoverer().discover(app)).toEqual([
      'tkinter.filedialog',
      'tkinter.messagebox',
      'tkinter.ttk',
    ]);
  });

  it('uses configured extra submodules', () => {
    const app = write('game.py', 'import kivy\n');
    const discoverer = new ImportDiscoverer({ extraSubmodules: { kivy: ['kivy.core.window'] } });
    expect(discoverer.discover(app)).toEqual(['kivy', 'kivy.core.window']);
  });

  it('keeps going when a sibling does not parse', () => {
    const app = write('app.py', 'import requests\n');
    write('template.py', '{% block imports %}\nimport jinja_only\n{% endblock %}\n');
    expect(new ImportDiscoverer().discover(app)).toEqual(['jinja_only', 'requests']);
  });

  it('treats a throwing resolver as unresolved', () => {
    const app = write('app.py', 'import requests\n');
    const discoverer = new ImportDiscoverer({
      resolver: {
        canResolve: () => {
          throw new Error('boom');
        },
      },
    });
    expect(discoverer.discover(app)).toEqual([]);
  });

  it('returns nothing for missing or non-python entries', () => {
    write('README.md', 'import requests\n');
    const discoverer = new ImportDiscoverer();
    expect(discoverer.discover(join(dir, 'missing.py'))).toEqual([]);
    expect(discoverer.discover(join(dir, 'README.md'))).toEqual([]);
  });

  it('can be switched off at run time', () => {
    const app = write('app.py', 'import requests\n');
    const discoverer = new ImportDiscoverer();
    discoverer.updateSettings({ enabled: false });
    expect(discoverer.discover(app)).toEqual([]);
    discoverer.updateSettings({ enabled: true });
    expect(discoverer.discover(app)).toEqual(['requests']);
  });

  it('applies partial setting updates over the current values', () => {
    const discoverer = new ImportDiscoverer({ maxDepth: 1, excluded: ['secrets_local'] });
    discoverer.updateSettings({ maxDepth: 0 });
    expect(discoverer.getSettings()).toEqual({
      enabled: true,
      maxDepth: 0,
      extraSubmodules: {},
      excluded: ['secrets_local'],
    });
  });

  it('does not carry state between calls', () => {
    const first = write('first.py', 'import requests\n');
    const other = mkdtempSync(join(tmpdir(), 'exepack-discover-'));
    const second = join(other, 'second.py');
    writeFileSync(second, 'import yaml\n');

    const discoverer = new ImportDiscoverer();
    expect(discoverer.discover(first)).toEqual(['requests']);
    expect(discoverer.discover(second)).toEqual(['yaml']);
    expect(discoverer.discover(first)).toEqual(['requests']);
  });
});

describe('createImportDiscoverer', () => {
  it('verifies names against the interpreter search path', () => {
    const site = join(dir, 'site-packages');
    mkdirSync(join(site, 'requests'), { recursive: true });
    writeFileSync(join(site, 'requests', '__init__.py'), '');
    const app = write('app.py', 'import requests\nimport notinstalled\n');

    const discoverer = createImportDiscoverer({
      run: () =>
        JSON.stringify({ version: '3.12.1', stdlib: ['os'], builtin: ['sys'], path: [site] }),
    });
    expect(discoverer.discover(app)).toEqual(['requests']);
  });

  it('falls back to unverified names when the interpreter is unavailable', () => {
    const app = write('app.py', 'import requests\nimport notinstalled\n');
    const discoverer = createImportDiscoverer({
      run: () => {
        throw new Error('spawn python3 ENOENT');
      },
    });
    expect(discoverer.discover(app)).toEqual(['notinstalled', 'requests']);
  });

  it('skips the interpreter check when verification is off', () => {
    const app = write('app.py', 'import requests\n');
    let probed = false;
    const discoverer = createImportDiscoverer({
      settings: { ...defaultSettings().discovery, maxDepth: 1 },
      verify: false,
      run: () => {
        probed = true;
        return '';
      },
    });
    expect(discoverer.discover(app)).toEqual(['requests']);
    expect(probed).toBe(false);
  });
});
