import { performance } from 'node:perf_hooks';

import type { UnitId } from '../units/unitId.js';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

function envTraceEnabled(): boolean {
  const v = process.env.AOT_IMAGE_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env.AOT_IMAGE_TRACE_LEVEL ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  // Default to info so tracing is helpful without being too noisy.
  return 'info';
}

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isTraceEnabled(): boolean {
  return envTraceEnabled();
}

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

/** Payload carried by each pipeline event, keyed by event name. */
export type TraceEvents = {
  'build.start': { entryUnit: UnitId; precompile: string | null };
  'build.units': { units: readonly UnitId[] };
  'build.done': { exitCode: number };
  'units.discovered': { roots: readonly string[]; units: readonly UnitId[] };
  'units.unlocated': { unit: UnitId; roots: readonly string[] };
  'compile.failed': { unit: UnitId };
  'compile.done': { units: number; outputs: number };
  'native-image.located': { path: string };
  'process.spawn': { executable: string; args: readonly string[] };
  'process.exit': {
    executable: string;
    code: number | null;
    signal: NodeJS.Signals | null;
    exitCode: number;
  };
};

export type TraceEvent = keyof TraceEvents;

type TracePayload<E extends TraceEvent> = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: E;
  data: TraceEvents[E];
};

export function trace<E extends TraceEvent>(level: TraceLevel, event: E, data: TraceEvents[E]) {
  if (!shouldTrace(level)) return;

  const payload: TracePayload<E> = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
    data,
  };

  // Trace goes to stderr: stdout carries the compiler's own output.
  // eslint-disable-next-line no-console
  console.error('[aot-image:trace]', JSON.stringify(payload));
}

export function traceError<E extends TraceEvent>(event: E, data: TraceEvents[E]) {
  trace('error', event, data);
}

export function traceWarn<E extends TraceEvent>(event: E, data: TraceEvents[E]) {
  trace('warn', event, data);
}

export function traceInfo<E extends TraceEvent>(event: E, data: TraceEvents[E]) {
  trace('info', event, data);
}

export function traceDebug<E extends TraceEvent>(event: E, data: TraceEvents[E]) {
  trace('debug', event, data);
}
