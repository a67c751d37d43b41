import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import { InvalidDescriptorError } from '../errors.js';
import { logDebug } from './logger.js';

export const CONFIG_FILES = ['aot-image.config.js', 'aot-image.config.mjs'] as const;

const runtimeConfigSchema = z.object({
  /** Enable debug logs without env var */
  debug: z.boolean().optional(),
  /** Scratch directory compiled units are written to (default: `classes`) */
  compilePath: z.string().min(1).optional(),
  nativeImage: z
    .object({
      /** Executable name searched for on disk (without `.cmd`) */
      binary: z.string().min(1).optional(),
      /** Env var naming the toolchain home directory */
      homeEnv: z.string().min(1).optional(),
    })
    .optional(),
});

export type AotImageRuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export const DEFAULT_COMPILE_PATH = 'classes';
export const DEFAULT_NATIVE_IMAGE_BINARY = 'native-image';
export const DEFAULT_HOME_ENV = 'GRAALVM_HOME';

let cached:
  | { loaded: true; config: AotImageRuntimeConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string): string | null {
  for (const name of CONFIG_FILES) {
    const p = join(projectRoot, name);
    if (existsSync(p)) return p;
  }
  return null;
}

/**
 * Loads optional `aot-image.config.js` (or `.mjs`) from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<AotImageRuntimeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!p) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const raw = isModuleWithDefault(mod) ? mod.default : mod;

  const parsed = runtimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidDescriptorError(p, parsed.error.issues.map(formatIssue).join('; '));
  }

  cached = { loaded: true, config: parsed.data };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** Resolved settings with defaults applied. */
export type ResolvedRuntimeConfig = {
  debug: boolean;
  compilePath: string;
  nativeImageBinary: string;
  homeEnv: string;
};

export function resolveRuntimeConfig(
  config: AotImageRuntimeConfig | null,
  projectRoot: string = process.cwd(),
): ResolvedRuntimeConfig {
  return {
    debug: config?.debug ?? false,
    compilePath: resolve(projectRoot, config?.compilePath ?? DEFAULT_COMPILE_PATH),
    nativeImageBinary: config?.nativeImage?.binary ?? DEFAULT_NATIVE_IMAGE_BINARY,
    homeEnv: config?.nativeImage?.homeEnv ?? DEFAULT_HOME_ENV,
  };
}

export function formatIssue(issue: z.ZodIssue): string {
  const at = issue.path.length ? issue.path.join('.') : '(root)';
  return `${at}: ${issue.message}`;
}

function isModuleWithDefault(mod: unknown): mod is { default: unknown } {
  return typeof mod === 'object' && mod !== null && 'default' in mod;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
