// Branchcheck library entry point

export * from './graph/types.js';
export * from './graph/errors.js';
export * from './graph/directed-graph.js';
export * from './graph/dataflow.js';
export * from './graph/state-space.js';
export * from './graph/algorithms/search.js';
export * from './graph/algorithms/sort.js';
export * from './graph/algorithms/paths.js';
export * from './graph/algorithms/dominators.js';

export * from './scenario/types.js';
export * from './scenario/graph-builder.js';
export * from './scenario/entity-flow.js';
export * from './scenario/state-exploration.js';

export * from './consistency/types.js';
export { selectDominatorPaths } from './consistency/path-selection.js';
export type { SelectPathsOptions } from './consistency/path-selection.js';
export * from './consistency/consistency-service.js';

export * from './config/analysis-config.js';
export { DEBUG_CATEGORIES, debug, debugTimed } from './shared/debug.js';
export type { DebugCategory } from './shared/debug.js';
