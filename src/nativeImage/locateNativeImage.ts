import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { EnvironmentProvider } from '../env/environment.js';
import { DEFAULT_HOME_ENV, DEFAULT_NATIVE_IMAGE_BINARY } from '../dx/config.js';
import { traceDebug } from '../dx/trace.js';

export type LocateOptions = {
  /** Executable name without extension. */
  binary?: string;
  /** Env var naming the toolchain home. */
  homeEnv?: string;
};

export function nativeImageFileName(env: EnvironmentProvider, binary = DEFAULT_NATIVE_IMAGE_BINARY): string {
  return env.platform().isWindows ? `${binary}.cmd` : binary;
}

/** `$HOME/bin`, `$HOME`, then PATH, without repeats. */
export function candidateDirs(env: EnvironmentProvider, homeEnv = DEFAULT_HOME_ENV): string[] {
  const home = env.get(homeEnv);
  const homeDirs = home ? [join(home, 'bin'), home] : [];
  const pathDirs = (env.get('PATH') ?? '').split(env.platform().pathDelimiter).filter(Boolean);
  return [...new Set([...homeDirs, ...pathDirs])];
}

/**
 * Absolute path of the first native-image binary found, or null.
 */
export function locateNativeImage(env: EnvironmentProvider, opts: LocateOptions = {}): string | null {
  const fileName = nativeImageFileName(env, opts.binary);
  for (const dir of candidateDirs(env, opts.homeEnv)) {
    const file = join(dir, fileName);
    if (existsSync(file)) {
      const found = resolve(env.cwd(), file);
      traceDebug('native-image.located', { path: found });
      return found;
    }
  }
  return null;
}
