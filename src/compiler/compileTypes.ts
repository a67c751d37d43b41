import type { UnitId } from '../units/unitId.js';

export type CompileOutcome =
  | { ok: true; unit: UnitId; outputs: string[] }
  | { ok: false; unit: UnitId; cause: unknown };

/**
 * Host facility that compiles one named unit into the scratch directory.
 *
 * Implementations report failure through the outcome instead of throwing so
 * a test double can fail selected units.
 */
export interface UnitCompiler {
  compile(unit: UnitId): CompileOutcome;
}

/** Receives user-facing output one line at a time. */
export type LineSink = (line: string) => void;

export const stdoutSink: LineSink = (line) => {
  // eslint-disable-next-line no-console
  console.log(line);
};
