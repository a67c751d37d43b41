import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { EnvironmentProvider } from '../env/environment.js';
import type { DescriptorLocations } from './depsJsonTypes.js';

export const DEPS_FILE = 'deps.json';

/**
 * Root of the installed aot-image package (the directory holding its
 * package.json). The install-level deps.json ships there.
 */
export function getPackageRoot(): string {
  const here = dirname(fileURLToPath(import.meta.url));

  // Walk up: sources live at src/deps, the build at dist/deps.
  let cur = here;
  for (let i = 0; i < 8; i++) {
    if (existsSync(join(cur, 'package.json'))) return cur;
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  return join(here, '..', '..');
}

export function getUserConfigDir(env: EnvironmentProvider): string {
  const explicit = env.get('AOT_IMAGE_CONFIG');
  if (explicit) return explicit;
  const xdg = env.get('XDG_CONFIG_HOME');
  if (xdg) return join(xdg, 'aot-image');
  return join(env.homeDir(), '.aot-image');
}

export function getDescriptorLocations(env: EnvironmentProvider): DescriptorLocations {
  return {
    install: join(getPackageRoot(), DEPS_FILE),
    user: join(getUserConfigDir(env), DEPS_FILE),
    project: join(env.cwd(), DEPS_FILE),
  };
}
