import { existsSync, readFileSync } from 'node:fs';

import { ConfigNotFoundError, InvalidDescriptorError } from '../errors.js';
import { formatIssue } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { depsJsonSchema } from './depsJsonTypes.js';
import type { DepsJson, DescriptorLocations, DescriptorSet } from './depsJsonTypes.js';

/** Reads one deps.json, or null when the file does not exist. */
export function readDepsJson(jsonPath: string): DepsJson | null {
  if (!existsSync(jsonPath)) return null;

  const raw = readFileSync(jsonPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new InvalidDescriptorError(jsonPath, err instanceof Error ? err.message : String(err));
  }

  const result = depsJsonSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidDescriptorError(jsonPath, result.error.issues.map(formatIssue).join('; '));
  }
  return result.data;
}

/**
 * Reads the install, user and project layers.
 *
 * Fails with ConfigNotFoundError when none of them exists.
 */
export function readDescriptors(locations: DescriptorLocations): DescriptorSet {
  const set: DescriptorSet = {
    install: readDepsJson(locations.install),
    user: readDepsJson(locations.user),
    project: readDepsJson(locations.project),
  };

  logDebug('descriptors', {
    install: set.install ? locations.install : null,
    user: set.user ? locations.user : null,
    project: set.project ? locations.project : null,
  });

  if (!set.install && !set.user && !set.project) {
    throw new ConfigNotFoundError([locations.install, locations.user, locations.project]);
  }
  return set;
}
