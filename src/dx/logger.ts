let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.AOT_IMAGE_DEBUG === '1';
}

/**
 * Enable/disable aot-image debug logging programmatically.
 *
 * The CLI flips this on when the runtime config sets `debug: true`.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[aot-image]', ...args);
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[aot-image]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[aot-image]', ...args);
}
