import type { EnvironmentProvider } from '../env/environment.js';

/** Search-path entries containing this are this tool's own and are dropped. */
export const SELF_MARKER = 'aot-image';

/**
 * The process search path with this tool's own entries removed and the
 * scratch directory put first. Reads nothing but `env`.
 */
export function buildSearchPath(
  env: EnvironmentProvider,
  scratchPath: string,
  selfMarker: string = SELF_MARKER,
): string {
  const delimiter = env.platform().pathDelimiter;
  const entries = env
    .searchPath()
    .split(delimiter)
    .filter((entry) => entry !== '' && !entry.includes(selfMarker));
  return [scratchPath, ...entries].join(delimiter);
}
