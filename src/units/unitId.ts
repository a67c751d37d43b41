import { sep } from 'node:path';

/** Fully-qualified dotted module name, e.g. `app.core-util`. */
export type UnitId = string;

/** Source extensions that make a file a compilable unit, in resolution order. */
export const UNIT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.js', '.mjs'] as const;

const UNIT_ID_RE = /^[A-Za-z_$][\w$-]*(\.[A-Za-z_$][\w$-]*)*$/;

export function isUnitSource(fileName: string): boolean {
  if (fileName.endsWith('.d.ts') || fileName.endsWith('.d.mts')) return false;
  return UNIT_EXTENSIONS.some((ext) => fileName.endsWith(ext));
}

export function isValidUnitId(id: string): boolean {
  return UNIT_ID_RE.test(id);
}

/** Hyphens are not legal in emitted symbol names; the compiler sees underscores. */
export function munge(id: string): string {
  return id.replaceAll('-', '_');
}

/**
 * `app/core_util.ts` -> `app.core-util`
 *
 * `relPath` is relative to its source root.
 */
export function unitIdFromPath(relPath: string): UnitId {
  const ext = UNIT_EXTENSIONS.find((e) => relPath.endsWith(e));
  const stem = ext ? relPath.slice(0, -ext.length) : relPath;
  return stem.split(/[\\/]/).join('.').replaceAll('_', '-');
}

/** `app.core-util` -> `app/core_util` (no extension) */
export function unitIdToPathStem(id: UnitId): string {
  return munge(id).split('.').join(sep);
}

/** Splits a comma separated list of units, dropping blanks. */
export function parseUnitList(csv: string | undefined): UnitId[] {
  return (csv ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
