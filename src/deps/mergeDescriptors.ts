import { depsJsonSchema } from './depsJsonTypes.js';
import type { DepsJson, DescriptorLocations, DescriptorSet, EffectiveConfig } from './depsJsonTypes.js';
import { readDescriptors } from './depsJson.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(v: unknown): v is PlainObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// When every layer holds a map, shallow-merge them; anything else is replaced.
function mergeOrReplace(values: unknown[]): unknown {
  if (values.every(isPlainObject)) {
    return Object.assign({}, ...values);
  }
  return values[values.length - 1];
}

/**
 * Merges descriptor layers left to right. Missing (null) layers are skipped.
 */
export function mergeDepsJson(layers: Array<DepsJson | null>): EffectiveConfig {
  const present = layers.filter((l): l is DepsJson => l != null);
  const byKey = new Map<string, unknown[]>();

  for (const layer of present) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const seen = byKey.get(key);
      if (seen) seen.push(value);
      else byKey.set(key, [value]);
    }
  }

  const merged: PlainObject = {};
  for (const [key, values] of byKey) {
    merged[key] = mergeOrReplace(values);
  }
  // Every layer already passed the schema; this only narrows the merged shape.
  return Object.freeze(depsJsonSchema.parse(merged));
}

/** install < user < project */
export function mergeDescriptors(set: DescriptorSet): EffectiveConfig {
  return mergeDepsJson([set.install, set.user, set.project]);
}

/** Reads all three layers and merges them into the effective config. */
export function loadEffectiveConfig(locations: DescriptorLocations): EffectiveConfig {
  return mergeDescriptors(readDescriptors(locations));
}

/** Source roots of the effective config, in declared order. */
export function sourceRoots(config: EffectiveConfig): string[] {
  return [...(config.paths ?? [])];
}
