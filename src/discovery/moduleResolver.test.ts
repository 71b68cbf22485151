import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { acceptAllResolver, SitePackagesResolver } from './moduleResolver.js';

function sitePackages() {
  const site = mkdtempSync(join(tmpdir(), 'exepack-site-'));
  mkdirSync(join(site, 'numpy', 'core'), { recursive: true });
  writeFileSync(join(site, 'numpy', '__init__.py'), '');
  writeFileSync(join(site, 'numpy', 'core', '__init__.py'), '');
  writeFileSync(join(site, 'numpy', 'lib.py'), '');
  writeFileSync(join(site, 'six.py'), '');
  writeFileSync(join(site, '_cffi_backend.cpython-312-x86_64-linux-gnu.so'), '');
  writeFileSync(join(site, 'win32api.pyd'), '');
  mkdirSync(join(site, 'google', 'protobuf'), { recursive: true });
  writeFileSync(join(site, 'google', 'protobuf', '__init__.py'), '');
  return site;
}

describe('SitePackagesResolver', () => {
  const site = sitePackages();
  const empty = mkdtempSync(join(tmpdir(), 'exepack-site-'));
  const resolver = new SitePackagesResolver([empty, site]);

  it('finds packages, modules and extension modules', () => {
    expect(resolver.canResolve('numpy')).toBe(true);
    expect(resolver.canResolve('six')).toBe(true);
    expect(resolver.canResolve('_cffi_backend')).toBe(true);
    expect(resolver.canResolve('win32api')).toBe(true);
  });

  it('finds submodules and namespace packages', () => {
    expect(resolver.canResolve('numpy.core')).toBe(true);
    expect(resolver.canResolve('numpy.lib')).toBe(true);
    expect(resolver.canResolve('google')).toBe(true);
    expect(resolver.canResolve('google.protobuf')).toBe(true);
  });

  it('rejects what is not installed', () => {
    expect(resolver.canResolve('pandas')).toBe(false);
    expect(resolver.canResolve('numpy.missing')).toBe(false);
    expect(resolver.canResolve('six.moves')).toBe(false);
  });

  it('rejects names that are not python identifiers', () => {
    expect(resolver.canResolve('../etc')).toBe(false);
    expect(resolver.canResolve('numpy..core')).toBe(false);
    expect(resolver.canResolve('')).toBe(false);
  });
});

describe('acceptAllResolver', () => {
  it('keeps every name', () => {
    expect(acceptAllResolver.canResolve('anything')).toBe(true);
  });
});
