export { build, runBuild } from './build.js';
export type { BuildDeps, BuildOptions, UnitCompilerContext } from './build.js';

export { runCli, createProgram, parseCommandLine, preflight, splitCompilerArgs } from './cliOptions.js';
export type { CliOptions, ParsedCommandLine, PreflightResult } from './cliOptions.js';

export { readDepsJson, readDescriptors } from './deps/depsJson.js';
export { getDescriptorLocations, getPackageRoot, getUserConfigDir } from './deps/depsPaths.js';
export { loadEffectiveConfig, mergeDepsJson, mergeDescriptors, sourceRoots } from './deps/mergeDescriptors.js';
export type {
  DepsJson,
  DescriptorLayer,
  DescriptorLocations,
  DescriptorSet,
  EffectiveConfig,
} from './deps/depsJsonTypes.js';

export { discoverUnits, locateUnitSource } from './units/discoverUnits.js';
export type { DiscoveredUnits } from './units/discoverUnits.js';
export { findUnitsInDir } from './units/findUnitsInDir.js';
export type { UnitSource } from './units/findUnitsInDir.js';
export { OrderedSet } from './units/orderedSet.js';
export { munge, parseUnitList, unitIdFromPath } from './units/unitId.js';
export type { UnitId } from './units/unitId.js';

export { prepareScratchDir } from './scratch/prepareScratchDir.js';

export { compileAll } from './compiler/compileAll.js';
export { createTypeScriptUnitCompiler } from './compiler/typescriptUnitCompiler.js';
export type { CompileOutcome, LineSink, UnitCompiler } from './compiler/compileTypes.js';
export { detectPlatform, platformInfo } from './compiler/detectPlatform.js';
export type { PlatformInfo } from './compiler/detectPlatform.js';

export { buildSearchPath } from './nativeImage/searchPath.js';
export { buildNativeImageArgs, formatInvocation, invokeNativeImage } from './nativeImage/invokeNativeImage.js';
export type { NativeImageInvokeOptions } from './nativeImage/invokeNativeImage.js';
export { locateNativeImage } from './nativeImage/locateNativeImage.js';

export { runProcess, childProcessRunner } from './process/runProcess.js';
export type { ProcessRunner } from './process/runProcess.js';

export { processEnvironment, staticEnvironment } from './env/environment.js';
export type { EnvironmentProvider } from './env/environment.js';

export {
  AotImageError,
  CompileFailureError,
  ConfigNotFoundError,
  InvalidDescriptorError,
  IOFailureError,
  LaunchFailureError,
  isAotImageError,
} from './errors.js';
export type { AotImageErrorCode } from './errors.js';
