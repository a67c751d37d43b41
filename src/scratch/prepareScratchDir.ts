import { existsSync, lstatSync, mkdirSync, readdirSync, rmdirSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';

import { IOFailureError } from '../errors.js';
import { logDebug } from '../dx/logger.js';

// Children are listed before their parent directory.
function collectDeepestFirst(dir: string, out: string[]) {
  for (const ent of readdirSync(dir, { withFileTypes: true })) {
    const p = join(dir, ent.name);
    if (ent.isDirectory()) collectDeepestFirst(p, out);
    out.push(p);
  }
}

function removeEntry(p: string) {
  // lstat: a symlink to a directory is removed as a link, never followed.
  if (lstatSync(p).isDirectory()) rmdirSync(p);
  else unlinkSync(p);
}

/**
 * Empties `path` and makes sure it exists as a directory.
 *
 * The directory itself is kept; everything below it is deleted deepest-first.
 * Any failure aborts with IOFailureError.
 */
export function prepareScratchDir(path: string): void {
  const entries: string[] = [];

  try {
    if (existsSync(path)) {
      if (!lstatSync(path).isDirectory()) {
        throw new Error('exists and is not a directory');
      }
      collectDeepestFirst(path, entries);
    }
  } catch (err) {
    throw new IOFailureError(path, err);
  }

  for (const p of entries) {
    try {
      removeEntry(p);
    } catch (err) {
      throw new IOFailureError(p, err);
    }
  }

  try {
    mkdirSync(path, { recursive: true });
  } catch (err) {
    throw new IOFailureError(path, err);
  }

  logDebug('scratch dir ready', { path, removed: entries.length });
}
