import { closeSync, existsSync, openSync, readdirSync, readSync, statSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';

import { logWarn } from '../dx/logger.js';
import { isUnitSource, isValidUnitId, unitIdFromPath, type UnitId } from './unitId.js';

export type UnitSource = {
  id: UnitId;
  /** Absolute path of the source file. */
  file: string;
  /** Source root the file was found under. */
  root: string;
};

const SKIP_DIRS = new Set(['node_modules']);

// Only the head of a file can carry the leading doc comment.
const HEAD_BYTES = 4096;

/**
 * Name declared by a leading `@module` doc tag, e.g.
 *
 *   /** @module app.core *\/
 */
export function declaredUnitId(source: string): UnitId | null {
  const m = source.match(/^\s*(?:\/\/[^\n]*\n\s*)*\/\*\*([\s\S]*?)\*\//);
  if (!m) return null;
  const tag = m[1].match(/@module\s+([^\s*]+)/);
  return tag ? tag[1] : null;
}

function readHead(file: string): string {
  const fd = openSync(file, 'r');
  try {
    const buf = Buffer.alloc(HEAD_BYTES);
    const n = readSync(fd, buf, 0, HEAD_BYTES, 0);
    return buf.toString('utf8', 0, n);
  } finally {
    closeSync(fd);
  }
}

function isWithin(p: string, dir: string): boolean {
  return p === dir || p.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

function walk(dir: string, out: string[], exclude: readonly string[]) {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const ent of entries) {
    if (ent.name.startsWith('.') || SKIP_DIRS.has(ent.name)) continue;
    const p = join(dir, ent.name);
    if (ent.isDirectory()) {
      if (!exclude.some((x) => isWithin(p, x))) walk(p, out, exclude);
    } else if (ent.isFile() && isUnitSource(ent.name)) out.push(p);
  }
}

/**
 * Every unit under `root`, in path order. A root that does not exist (or is
 * not a directory) yields nothing. Directories in `exclude` (absolute), and
 * everything below them, are not scanned.
 */
export function findUnitsInDir(root: string, exclude: readonly string[] = []): UnitSource[] {
  if (!existsSync(root) || !statSync(root).isDirectory()) return [];

  const skipped = exclude.map((x) => resolve(x));
  const files: string[] = [];
  walk(resolve(root), files, skipped);

  const units: UnitSource[] = [];
  for (const file of files) {
    const declared = declaredUnitId(readHead(file));
    let id = unitIdFromPath(relative(root, file));
    if (declared) {
      if (isValidUnitId(declared)) id = declared;
      else logWarn(`ignoring invalid @module name "${declared}" in ${file}`);
    }
    units.push({ id, file, root });
  }
  return units;
}
