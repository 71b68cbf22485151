/** Subsystem a log line comes from; shown after the prefix as `[exepack:<scope>]`. */
export type LogScope = 'cache' | 'discovery' | 'parser' | 'packaging' | 'config';

export type ScopedLogger = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
};

let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.EXEPACK_DEBUG === '1';
}

/**
 * Enable/disable exepack debug logging programmatically.
 *
 * Set from the `debug` config field and by tests.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

/**
 * Logger for one subsystem. Everything is silent unless debug logging is on:
 * cache and discovery problems never reach the user's terminal by default,
 * since packaging carries on without them.
 */
export function createLogger(scope: LogScope): ScopedLogger {
  const prefix = `[exepack:${scope}]`;
  return {
    debug(...args) {
      if (!isDebugEnabled()) return;
      // eslint-disable-next-line no-console
      console.log(prefix, ...args);
    },
    info(...args) {
      if (!isDebugEnabled()) return;
      // eslint-disable-next-line no-console
      console.log(prefix, ...args);
    },
    warn(...args) {
      if (!isDebugEnabled()) return;
      // eslint-disable-next-line no-console
      console.warn(prefix, ...args);
    },
  };
}
