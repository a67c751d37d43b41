import { CompileFailureError } from '../errors.js';
import { traceError, traceInfo } from '../dx/trace.js';
import type { UnitId } from '../units/unitId.js';
import { stdoutSink, type LineSink, type UnitCompiler } from './compileTypes.js';

/**
 * Compiles every unit in order. Stops at the first failure, throwing
 * CompileFailureError; later units are not attempted.
 */
export function compileAll(
  units: readonly UnitId[],
  compiler: UnitCompiler,
  out: LineSink = stdoutSink,
): string[] {
  const outputs: string[] = [];

  for (const unit of units) {
    out(`Compiling ${unit}`);
    const res = compiler.compile(unit);
    if (!res.ok) {
      traceError('compile.failed', { unit });
      throw new CompileFailureError(unit, res.cause);
    }
    outputs.push(...res.outputs);
  }

  traceInfo('compile.done', { units: units.length, outputs: outputs.length });
  return outputs;
}
