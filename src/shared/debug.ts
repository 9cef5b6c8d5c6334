import { isDebugEnabled } from './config.js';

/** Areas of the engine that write debug lines. */
export const DEBUG_CATEGORIES = [
  'graph',
  'dataflow',
  'statespace',
  'scenario',
  'consistency',
  'config',
] as const;

export type DebugCategory = (typeof DEBUG_CATEGORIES)[number];

// Resolved on the first log call, cleared by resetDebugState()
let _enabled: boolean | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

export function resetDebugState(): void {
  _enabled = null;
}

/**
 * Writes `[ISO_TIMESTAMP] [BRANCHCHECK:category] message {json_data}` to
 * stderr when BRANCHCHECK_DEBUG or `debug` in config.json is set.
 *
 * @param data - Counts and ids, not node or path lists
 */
export function debug(
  category: DebugCategory,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) {
    return;
  }

  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [BRANCHCHECK:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Runs `fn` and logs how long it took. Disabled: just runs `fn`.
 */
export function debugTimed<T>(
  category: DebugCategory,
  message: string,
  fn: () => T,
): T {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}
