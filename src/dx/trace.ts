import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

function envTraceEnabled(): boolean {
  const v = process.env.EXEPACK_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env.EXEPACK_TRACE_LEVEL ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return 'info';
}

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

/** Every event exepack emits; tools reading the trace can switch on these. */
export type TraceEvent =
  | 'cache.hit'
  | 'cache.miss'
  | 'cache.store'
  | 'cache.evict'
  | 'cache.sweep'
  | 'discovery.scan'
  | 'discovery.done'
  | 'warning';

type TracePayload = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: TraceEvent;
  data?: Record<string, unknown>;
};

export function formatTrace(
  level: TraceLevel,
  event: TraceEvent,
  data?: Record<string, unknown>,
  t: number = performance.now(),
): string {
  const payload: TracePayload = {
    t: Number(t.toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) payload.data = data;
  return JSON.stringify(payload);
}

export function trace(level: TraceLevel, event: TraceEvent, data?: Record<string, unknown>) {
  if (!shouldTrace(level)) return;
  // eslint-disable-next-line no-console
  console.log('[exepack:trace]', formatTrace(level, event, data));
}

export function traceWarn(event: TraceEvent, data?: Record<string, unknown>) {
  trace('warn', event, data);
}

export function traceInfo(event: TraceEvent, data?: Record<string, unknown>) {
  trace('info', event, data);
}

export function traceDebug(event: TraceEvent, data?: Record<string, unknown>) {
  trace('debug', event, data);
}
