import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `BRANCHCHECK_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<config dir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.BRANCHCHECK_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  const config = readConfigJson('config.json');
  _debugCached = config !== null && config.debug === true;
  return _debugCached;
}

/**
 * Clears the cached debug flag. Tests flip BRANCHCHECK_DEBUG between cases.
 */
export function resetDebugCache(): void {
  _debugCached = null;
}

/**
 * Returns the configuration directory.
 * Default: ~/.branchcheck/
 *
 * Supports BRANCHCHECK_CONFIG_DIR env var override for testing.
 * The directory is only read from, never created.
 */
export function getConfigDir(): string {
  return process.env.BRANCHCHECK_CONFIG_DIR || join(homedir(), '.branchcheck');
}

/**
 * Reads and parses a JSON object from the configuration directory.
 * Returns null when the file is missing, unreadable or not a JSON object.
 */
export function readConfigJson(fileName: string): Record<string, unknown> | null {
  let raw: string;
  try {
    raw = readFileSync(join(getConfigDir(), fileName), 'utf-8');
  } catch {
    // Missing file is the normal case -- defaults apply
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // Malformed JSON is treated the same as a missing file
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
