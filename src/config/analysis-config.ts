/**
 * Analysis Configuration
 *
 * User-configurable bounds for path enumeration, state-space exploration and
 * dominator-path consistency checks.
 *
 * Configuration is loaded from <config dir>/analysis.json with safe defaults
 * when the file does not exist. Each field is validated on its own: an
 * invalid value falls back to its default without discarding the rest.
 */

import { debug } from '../shared/debug.js';
import { isRecord, readConfigJson } from '../shared/config.js';

// =============================================================================
// Types
// =============================================================================

export interface AnalysisConfig {
  pathEnumeration: {
    /** Maximum playthrough paths returned by scenario path enumeration */
    maxPaths: number;
  };

  stateSpace: {
    /** Exploration depth bound for scenario state-space graphs */
    maxDepth: number;
  };

  dominatorPaths: {
    /** Maximum representative paths handed to the consistency evaluator */
    maxPaths: number;
  };

  consistency: {
    /** Minimum evaluator score for a path to count as consistent */
    passThreshold: number;
  };
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  pathEnumeration: {
    maxPaths: 100,
  },
  stateSpace: {
    maxDepth: 64,
  },
  dominatorPaths: {
    maxPaths: 20,
  },
  consistency: {
    passThreshold: 0.7,
  },
};

// =============================================================================
// Field Readers
// =============================================================================

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? value : {};
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : fallback;
}

function unitInterval(value: unknown, fallback: number): number {
  return typeof value === 'number' && value >= 0 && value <= 1 ? value : fallback;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Loads analysis configuration from disk.
 *
 * Reads analysis.json from the configuration directory. Falls back to
 * defaults if the file does not exist or cannot be parsed.
 */
export function loadAnalysisConfig(): AnalysisConfig {
  const raw = readConfigJson('analysis.json');
  if (raw === null) {
    debug('config', 'No analysis config found, using defaults');
    return structuredClone(DEFAULT_ANALYSIS_CONFIG);
  }
  debug('config', 'Loaded analysis config');

  const defaults = DEFAULT_ANALYSIS_CONFIG;

  return {
    pathEnumeration: {
      maxPaths: positiveInt(
        section(raw, 'pathEnumeration').maxPaths,
        defaults.pathEnumeration.maxPaths,
      ),
    },
    stateSpace: {
      maxDepth: positiveInt(section(raw, 'stateSpace').maxDepth, defaults.stateSpace.maxDepth),
    },
    dominatorPaths: {
      maxPaths: positiveInt(
        section(raw, 'dominatorPaths').maxPaths,
        defaults.dominatorPaths.maxPaths,
      ),
    },
    consistency: {
      passThreshold: unitInterval(
        section(raw, 'consistency').passThreshold,
        defaults.consistency.passThreshold,
      ),
    },
  };
}
