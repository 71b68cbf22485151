import { spawn } from 'node:child_process';
import { join } from 'node:path';

import type { BuildRequest, PackagingEngine } from './packagingTypes.js';
import { createLogger } from '../dx/logger.js';

const log = createLogger('packaging');

export type CommandEngineOptions = {
  /** Executable to run, e.g. `pyinstaller`. */
  command: string;
  /** Holds the engine's intermediate build files. */
  workDir: string;
};

/** Argument list for a PyInstaller-style command line. */
export function engineArgs(request: BuildRequest, workDir: string): string[] {
  return [
    ...request.args,
    '--distpath',
    request.distPath,
    '--workpath',
    join(workDir, 'build'),
    '--specpath',
    workDir,
  ];
}

/** Runs an external packaging tool; its output goes straight to the terminal. */
export function createCommandEngine(options: CommandEngineOptions): PackagingEngine {
  return {
    build(request) {
      const args = engineArgs(request, options.workDir);
      log.debug('executing', options.command, args.join(' '));

      return new Promise<string>((resolve, reject) => {
        const child = spawn(options.command, args, { stdio: 'inherit' });
        child.once('error', reject);
        child.once('exit', (code, signal) => {
          if (code === 0) resolve(request.distPath);
          else reject(new Error(`${options.command} exited with ${signal ?? `code ${code}`}`));
        });
      });
    },
  };
}
