import { createLogger, type LogScope, type ScopedLogger } from './logger.js';
import { traceWarn } from './trace.js';

export type ExepackWarningCode =
  | 'CACHE_WRITE_FAILED'
  | 'CACHE_EVICT_FAILED'
  | 'CACHE_METADATA_UNREADABLE'
  | 'SCRIPT_UNREADABLE'
  | 'DISCOVERY_FILE_SKIPPED'
  | 'DISCOVERY_FAILED'
  | 'INVALID_CONFIG';

export type ExepackWarning = {
  code: ExepackWarningCode;
  message: string;
  hint?: string;
};

const scopeOf: Record<ExepackWarningCode, LogScope> = {
  CACHE_WRITE_FAILED: 'cache',
  CACHE_EVICT_FAILED: 'cache',
  CACHE_METADATA_UNREADABLE: 'cache',
  SCRIPT_UNREADABLE: 'cache',
  DISCOVERY_FILE_SKIPPED: 'discovery',
  DISCOVERY_FAILED: 'discovery',
  INVALID_CONFIG: 'config',
};

const loggers = new Map<LogScope, ScopedLogger>();

function loggerFor(code: ExepackWarningCode): ScopedLogger {
  const scope = scopeOf[code];
  let log = loggers.get(scope);
  if (!log) {
    log = createLogger(scope);
    loggers.set(scope, log);
  }
  return log;
}

/**
 * Emit a non-fatal warning.
 *
 * This must never throw and must not print unless debug logging is enabled.
 * With EXEPACK_TRACE set, a `warning` trace event is written as well.
 */
export function warn(w: ExepackWarning) {
  try {
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    loggerFor(w.code).warn(`warning(${w.code}): ${w.message}${hint}`);
    traceWarn('warning', { code: w.code, message: w.message });
  } catch {
    // Never throw from warnings.
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
