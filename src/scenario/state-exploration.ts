/**
 * Scenario state-space exploration.
 *
 * Runs the frontier-merged builder over a scenario where the concrete state
 * is the set of entities present after each scene. Moving along a scene
 * transition applies the target scene's introduce/remove sets. Two visits to
 * the same scene with the same present-entity set merge into one state node.
 */

import { loadAnalysisConfig } from '../config/analysis-config.js';
import type { DataFlowNode } from '../graph/dataflow.js';
import { buildFrontierMergedGraph } from '../graph/state-space.js';
import type { FrontierMergedGraph, StateTransition } from '../graph/state-space.js';
import { buildEntityDataFlowNodes } from './entity-flow.js';
import { ScenarioGraphBuilder } from './graph-builder.js';
import type { Scenario, ScenarioClassifications, SceneTransition } from './types.js';

export type EntityState = ReadonlySet<string>;

export type ScenarioStateGraph = FrontierMergedGraph<string, EntityState, string, SceneTransition>;

export interface ExploreScenarioOptions {
  /** Default: stateSpace.maxDepth from analysis.json */
  maxDepth?: number;
  builder?: ScenarioGraphBuilder;
}

/**
 * Signature of an entity state: the sorted entity keys as a JSON array.
 */
export function entityStateSignature(state: EntityState): string {
  return JSON.stringify([...state].sort());
}

function applyScene(state: EntityState, node: DataFlowNode<string> | undefined): EntityState {
  if (node === undefined) return state;
  const next = new Set(state);
  for (const k of node.introducedEntities) next.add(k);
  for (const k of node.removedEntities) next.delete(k);
  return next;
}

/**
 * Explores the scenario's entity state space from its start scene.
 * Ending scenes are terminal. Returns null for a scenario without scenes.
 */
export function exploreScenarioStates(
  scenario: Scenario,
  classifications: ScenarioClassifications,
  options: ExploreScenarioOptions = {},
): ScenarioStateGraph | null {
  const builder = options.builder ?? new ScenarioGraphBuilder();
  const start = builder.findStartScene(scenario);
  if (start === null) return null;

  const graph = builder.build(scenario);
  const nodes = buildEntityDataFlowNodes(graph, classifications);
  const endings = new Set(builder.findEndingScenes(scenario));

  return buildFrontierMergedGraph({
    initialSceneId: start,
    initialState: applyScene(new Set(), nodes.get(start)),
    getTransitions: (sceneId, state): StateTransition<string, SceneTransition, EntityState>[] =>
      graph.getOutgoingEdges(sceneId).map((e) => ({
        toScene: e.to,
        label: e.label,
        nextState: applyScene(state, nodes.get(e.to)),
      })),
    stateSignature: entityStateSignature,
    isTerminalScene: (sceneId) => endings.has(sceneId),
    maxDepth: options.maxDepth ?? loadAnalysisConfig().stateSpace.maxDepth,
  });
}
