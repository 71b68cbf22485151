export type BuildRequest = {
  scriptPath: string;
  /** Full engine argument list, hidden-import flags included. */
  args: string[];
  /** Directory the engine writes its output into. */
  distPath: string;
};

/**
 * The external tool that turns a script into an executable. Resolves with
 * the path of the produced directory (or single file); rejects on failure.
 */
export interface PackagingEngine {
  build(request: BuildRequest): Promise<string>;
}

export type PackageRequest = {
  scriptPath: string;
  /** Engine arguments chosen by the user, without discovered imports. */
  args: string[];
  /** Scratch directory handed to the engine. */
  distPath: string;
  /** Where the finished artifact is delivered. */
  outputDir: string;
};

export type PackageResult = {
  cached: boolean;
  outputDir: string;
  hiddenImports: string[];
  /** Whether a fresh build made it into the cache. Always false on a hit. */
  stored: boolean;
};
