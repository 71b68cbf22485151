export { BuildCache } from './cache/buildCache.js';
export type { BuildCacheOptions, CacheSettingsUpdate } from './cache/buildCache.js';
export type { CacheEntry, CacheStats } from './cache/cacheTypes.js';
export { computeSignature, hashFile } from './cache/hash.js';
export { getCacheRoot } from './cache/cachePaths.js';

export { ImportDiscoverer, createImportDiscoverer } from './discovery/importDiscoverer.js';
export type {
  CreateDiscovererOptions,
  DiscoveryReport,
  DiscoverySettingsUpdate,
  ImportDiscovererOptions,
} from './discovery/importDiscoverer.js';
export { KNOWN_SUBMODULES, expandKnownSubmodules } from './discovery/heuristics.js';
export { SitePackagesResolver, acceptAllResolver } from './discovery/moduleResolver.js';
export type { ModuleResolver } from './discovery/moduleResolver.js';
export { probePythonEnvironment } from './discovery/pythonEnv.js';
export type { CommandRunner, PythonEnvironment } from './discovery/pythonEnv.js';

export { parsePythonImports, parsePythonFile, scanImportLines } from './parser/index.js';
export type { ImportParseResult, ImportStatement, ParseMethod } from './parser/parserTypes.js';

export { packageWithCache, hiddenImportArgs, extractScriptPath } from './packaging/packageWithCache.js';
export type { PackageDeps } from './packaging/packageWithCache.js';
export { createCommandEngine, engineArgs } from './packaging/commandEngine.js';
export type {
  BuildRequest,
  PackageRequest,
  PackageResult,
  PackagingEngine,
} from './packaging/packagingTypes.js';

export { defaultSettings, loadOptionalConfig, resolveSettings } from './dx/config.js';
export type { CacheSettings, DiscoverySettings, ExepackConfig, ExepackSettings } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
