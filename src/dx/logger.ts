let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.CS_TOOLCHAIN_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically (config file, tests).
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[cs-toolchain]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[cs-toolchain]', ...args);
}
