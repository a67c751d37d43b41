import type { PlatformInfo } from '../compiler/detectPlatform.js';
import { stdoutSink, type LineSink } from '../compiler/compileTypes.js';
import { logDebug } from '../dx/logger.js';
import { childProcessRunner, type ProcessRunner } from '../process/runProcess.js';
import { munge } from '../units/unitId.js';

export type NativeImageInvokeOptions = {
  nativeImagePath: string;
  /** Print the assembled command line before running it. */
  echo?: boolean;
  platform: PlatformInfo;
  runner?: ProcessRunner;
  out?: LineSink;
};

/**
 * Full native-image argument vector:
 * `[...extraArgs] [-cp <searchPath>] [<entryPoint>] [--no-server]`
 */
export function buildNativeImageArgs(
  extraArgs: readonly string[] | undefined,
  searchPath: string | undefined,
  entryPoint: string | undefined,
  platform: PlatformInfo,
): string[] {
  const args: string[] = [];
  if (extraArgs?.length) args.push(...extraArgs);
  if (searchPath) args.push('-cp', searchPath);
  if (entryPoint) args.push(munge(entryPoint));
  // native-image does not support --no-server on Windows.
  if (!platform.isWindows) args.push('--no-server');
  return args;
}

function quoteArg(arg: string): string {
  return arg.includes(' ') ? `'${arg}'` : arg;
}

export function formatInvocation(bin: string, args: readonly string[]): string {
  return [bin, ...args.map(quoteArg)].join(' ');
}

export function invokeNativeImage(
  extraArgs: readonly string[] | undefined,
  searchPath: string | undefined,
  entryPoint: string | undefined,
  opts: NativeImageInvokeOptions,
): Promise<number> {
  const out = opts.out ?? stdoutSink;
  const runner = opts.runner ?? childProcessRunner;
  const args = buildNativeImageArgs(extraArgs, searchPath, entryPoint, opts.platform);

  if (opts.echo) out(formatInvocation(opts.nativeImagePath, args));
  logDebug('native-image', { bin: opts.nativeImagePath, args });

  return runner.run(opts.nativeImagePath, args, out);
}
