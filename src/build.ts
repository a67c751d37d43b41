import { resolve } from 'node:path';

import { compileAll } from './compiler/compileAll.js';
import { stdoutSink, type LineSink, type UnitCompiler } from './compiler/compileTypes.js';
import { createTypeScriptUnitCompiler } from './compiler/typescriptUnitCompiler.js';
import { getDescriptorLocations } from './deps/depsPaths.js';
import type { DescriptorLocations, EffectiveConfig } from './deps/depsJsonTypes.js';
import { loadEffectiveConfig, sourceRoots } from './deps/mergeDescriptors.js';
import { DEFAULT_COMPILE_PATH, DEFAULT_HOME_ENV } from './dx/config.js';
import { logInfo } from './dx/logger.js';
import { traceInfo } from './dx/trace.js';
import { processEnvironment, type EnvironmentProvider } from './env/environment.js';
import { invokeNativeImage } from './nativeImage/invokeNativeImage.js';
import { buildSearchPath } from './nativeImage/searchPath.js';
import { runProcess, type ProcessRunner } from './process/runProcess.js';
import { prepareScratchDir } from './scratch/prepareScratchDir.js';
import { discoverUnits, type DiscoveredUnits } from './units/discoverUnits.js';
import { munge, type UnitId } from './units/unitId.js';

/** Options of one invocation. Never mutated. */
export type BuildOptions = Readonly<{
  nativeImagePath: string;
  echo?: boolean;
  /** Comma separated units compiled before the entry unit. */
  precompile?: string;
}>;

export type UnitCompilerContext = {
  outDir: string;
  roots: string[];
  discovered: DiscoveredUnits;
  config: EffectiveConfig;
  projectRoot: string;
};

/** Capabilities the pipeline runs against; defaults touch the real system. */
export type BuildDeps = {
  env?: EnvironmentProvider;
  locations?: DescriptorLocations;
  /** Scratch directory, relative to the project root. */
  compilePath?: string;
  homeEnv?: string;
  createUnitCompiler?: (ctx: UnitCompilerContext) => UnitCompiler;
  runner?: ProcessRunner;
  out?: LineSink;
};

function defaultUnitCompiler(ctx: UnitCompilerContext): UnitCompiler {
  return createTypeScriptUnitCompiler({
    outDir: ctx.outDir,
    roots: ctx.roots,
    sources: ctx.discovered.sources,
    compilerOptions: ctx.config.compilerOptions,
    projectRoot: ctx.projectRoot,
  });
}

/**
 * One end-to-end build. Resolves with native-image's exit code; any failure
 * before native-image runs rejects.
 */
export async function runBuild(
  entryUnit: UnitId,
  compilerArgs: readonly string[],
  options: BuildOptions,
  deps: BuildDeps = {},
): Promise<number> {
  const env = deps.env ?? processEnvironment();
  const out = deps.out ?? stdoutSink;
  const projectRoot = env.cwd();
  const homeEnv = deps.homeEnv ?? DEFAULT_HOME_ENV;

  traceInfo('build.start', { entryUnit, precompile: options.precompile ?? null });

  const config = loadEffectiveConfig(deps.locations ?? getDescriptorLocations(env));
  const roots = sourceRoots(config).map((r) => resolve(projectRoot, r));

  const outDir = resolve(projectRoot, deps.compilePath ?? DEFAULT_COMPILE_PATH);

  // A source root may contain the scratch dir; its contents are never units.
  const discovered = discoverUnits(entryUnit, options.precompile, config, projectRoot, [outDir]);
  traceInfo('build.units', { units: discovered.units });

  prepareScratchDir(outDir);

  const compiler = (deps.createUnitCompiler ?? defaultUnitCompiler)({
    outDir,
    roots,
    discovered,
    config,
    projectRoot,
  });
  compileAll(discovered.units, compiler, out);

  // Only now does the scratch dir hold what the search path points at.
  const searchPath = buildSearchPath(env, outDir);

  const runner: ProcessRunner = deps.runner ?? {
    run: (executable, args, sink) =>
      runProcess(executable, args, sink, { cwd: projectRoot, homeEnv, platform: env.platform() }),
  };

  const exitCode = await invokeNativeImage(compilerArgs, searchPath, munge(entryUnit), {
    nativeImagePath: options.nativeImagePath,
    echo: options.echo,
    platform: env.platform(),
    runner,
    out,
  });

  logInfo(`native-image exited with ${exitCode}`);
  traceInfo('build.done', { exitCode });
  return exitCode;
}

/** Runs the build and exits the process with native-image's exit code. */
export async function build(
  entryUnit: UnitId,
  compilerArgs: readonly string[],
  options: BuildOptions,
  deps: BuildDeps = {},
): Promise<never> {
  const exitCode = await runBuild(entryUnit, compilerArgs, options, deps);
  process.exit(exitCode);
}
