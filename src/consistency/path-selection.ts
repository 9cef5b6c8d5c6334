/**
 * Representative path selection for consistency evaluation.
 *
 * Checking every playthrough path is exponential, so two cheaper families
 * of paths are handed to the evaluator instead:
 *
 *   1. Dominator chains: for each target scene, the scenes every
 *      playthrough must visit before reaching it, in order.
 *   2. State-space paths: root-to-terminal paths of the frontier-merged
 *      entity state graph, compressed by shared suffixes.
 *
 * State-graph paths never revisit a state node and at most `maxPaths` of
 * them are enumerated. Paths are deduplicated by scene sequence and capped.
 */

import { computeImmediateDominators, dominatorChain } from '../graph/algorithms/dominators.js';
import { compressGraphPathsToEdgePaths } from '../graph/algorithms/paths.js';
import { debug } from '../shared/debug.js';
import type { ScenarioGraphBuilder } from '../scenario/graph-builder.js';
import type { ScenarioStateGraph } from '../scenario/state-exploration.js';
import type { Scenario } from '../scenario/types.js';
import type { RepresentativePath } from './types.js';

export interface SelectPathsOptions {
  builder: ScenarioGraphBuilder;
  maxPaths: number;
  /** Default: every ending scene */
  targetSceneIds?: string[];
  /** When given, compressed state-space paths follow the dominator chains */
  stateGraph?: ScenarioStateGraph | null;
  /** Depth bound for state-graph path enumeration */
  maxDepth?: number;
}

/**
 * Maps every scene reachable from the start scene to its immediate
 * dominator (null for the start scene). Empty for a scenario without scenes.
 */
export function computeDominatorTree(
  scenario: Scenario,
  builder: ScenarioGraphBuilder,
): Map<string, string | null> {
  const start = builder.findStartScene(scenario);
  if (start === null) return new Map();
  return computeImmediateDominators(builder.build(scenario), start);
}

export function selectDominatorPaths(
  scenario: Scenario,
  options: SelectPathsOptions,
): RepresentativePath[] {
  const { builder, maxPaths } = options;
  const idoms = computeDominatorTree(scenario, builder);
  if (idoms.size === 0 || maxPaths <= 0) return [];

  const targets = options.targetSceneIds ?? builder.findEndingScenes(scenario);
  const targetSet = new Set(targets);

  const selected: RepresentativePath[] = [];
  const seen = new Set<string>();

  const add = (path: RepresentativePath): void => {
    if (selected.length >= maxPaths) return;
    const k = JSON.stringify(path.sceneIds);
    if (seen.has(k)) return;
    seen.add(k);
    selected.push(path);
  };

  for (const target of targets) {
    const chain = dominatorChain(idoms, target);
    if (chain.length === 0) continue;
    add({
      sceneIds: chain,
      targetSceneId: target,
      immediateDominatorId: idoms.get(target) ?? null,
      source: 'dominator_chain',
    });
  }

  const stateGraph = options.stateGraph;
  if (stateGraph !== undefined && stateGraph !== null) {
    const edgePaths = compressGraphPathsToEdgePaths(stateGraph.graph, stateGraph.initialNode, {
      maxDepth: options.maxDepth,
      simplePaths: true,
      maxPaths,
    });

    for (const edgePath of edgePaths) {
      const sceneIds = [stateGraph.initialNode.sceneId, ...edgePath.map((e) => e.to.sceneId)];
      const target = sceneIds[sceneIds.length - 1];
      if (!targetSet.has(target)) continue;
      add({
        sceneIds,
        targetSceneId: target,
        immediateDominatorId: idoms.get(target) ?? null,
        source: 'state_space',
      });
    }
  }

  debug('consistency', 'Selected representative paths', {
    scenarioId: scenario.id,
    targets: targets.length,
    selected: selected.length,
  });
  return selected;
}
