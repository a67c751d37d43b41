import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { sourceRoots } from '../deps/mergeDescriptors.js';
import type { EffectiveConfig } from '../deps/depsJsonTypes.js';
import { traceDebug, traceWarn } from '../dx/trace.js';
import { findUnitsInDir, type UnitSource } from './findUnitsInDir.js';
import { OrderedSet } from './orderedSet.js';
import { UNIT_EXTENSIONS, parseUnitList, unitIdToPathStem, type UnitId } from './unitId.js';

export type DiscoveredUnits = {
  /** Units to compile, in order. */
  units: UnitId[];
  /** Source file per unit, for every unit that could be located. */
  sources: ReadonlyMap<UnitId, UnitSource>;
};

/**
 * Ordered compile list: explicit precompile units, then the entry unit, then
 * every unit found under the config's source roots that is not listed yet.
 * Duplicates keep their first position.
 *
 * Discovered units keep the order their roots and paths were scanned in; no
 * dependency ordering happens among them.
 */
export function discoverUnits(
  entryUnit: UnitId,
  precompileCsv: string | undefined,
  config: EffectiveConfig,
  projectRoot: string = process.cwd(),
  /** Directories never scanned, e.g. the scratch dir holding last run's output. */
  exclude: readonly string[] = [],
): DiscoveredUnits {
  const roots = sourceRoots(config).map((r) => resolve(projectRoot, r));

  const units = new OrderedSet<UnitId>(parseUnitList(precompileCsv));
  units.add(entryUnit);

  const sources = new Map<UnitId, UnitSource>();
  for (const root of roots) {
    for (const found of findUnitsInDir(root, exclude)) {
      units.add(found.id);
      // Two files claiming the same unit: the first root wins.
      if (!sources.has(found.id)) sources.set(found.id, found);
    }
  }

  for (const id of units) {
    if (sources.has(id)) continue;
    const located = locateUnitSource(id, roots);
    if (located) sources.set(id, located);
    else traceWarn('units.unlocated', { unit: id, roots });
  }

  const result = units.toArray();
  traceDebug('units.discovered', { roots, units: result });
  return { units: result, sources };
}

/** Finds `a.b-c` as `a/b_c.<ext>` in the first root that has it. */
export function locateUnitSource(id: UnitId, roots: string[]): UnitSource | null {
  const stem = unitIdToPathStem(id);
  for (const root of roots) {
    for (const ext of UNIT_EXTENSIONS) {
      const file = join(root, stem + ext);
      if (existsSync(file)) return { id, file, root };
    }
  }
  return null;
}
