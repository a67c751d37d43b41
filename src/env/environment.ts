import { homedir } from 'node:os';

import { detectPlatform, type PlatformInfo } from '../compiler/detectPlatform.js';

/**
 * Everything the pipeline reads from ambient process state.
 *
 * The search path builder and the binary locator only ever see this, so
 * tests can pin env vars and platform without touching `process`.
 */
export interface EnvironmentProvider {
  /** Value of an environment variable, or undefined when unset/empty. */
  get(name: string): string | undefined;
  /** The active module/library search path of this process. */
  searchPath(): string;
  platform(): PlatformInfo;
  homeDir(): string;
  cwd(): string;
}

/** Env var carrying the process search path handed to the image compiler. */
export const SEARCH_PATH_ENV = 'CLASSPATH';

function nonEmpty(v: string | undefined): string | undefined {
  return v == null || v === '' ? undefined : v;
}

export function processEnvironment(): EnvironmentProvider {
  const platform = detectPlatform();
  return {
    get: (name) => nonEmpty(process.env[name]),
    searchPath: () => process.env[SEARCH_PATH_ENV] ?? '',
    platform: () => platform,
    // Respect HOME when set (containers/sandboxes often differ from homedir()).
    homeDir: () => nonEmpty(process.env.HOME) ?? homedir(),
    cwd: () => process.cwd(),
  };
}

export type StaticEnvironmentInit = {
  vars?: Record<string, string | undefined>;
  platform?: PlatformInfo;
  homeDir?: string;
  cwd?: string;
};

/** A fixed environment, for tests and programmatic builds. */
export function staticEnvironment(init: StaticEnvironmentInit = {}): EnvironmentProvider {
  const vars = { ...(init.vars ?? {}) };
  const platform = init.platform ?? detectPlatform();
  return {
    get: (name) => nonEmpty(vars[name]),
    searchPath: () => vars[SEARCH_PATH_ENV] ?? '',
    platform: () => platform,
    homeDir: () => init.homeDir ?? homedir(),
    cwd: () => init.cwd ?? process.cwd(),
  };
}
