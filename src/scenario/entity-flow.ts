/**
 * Entity flow through a scenario.
 *
 * Turns per-scene entity classifications into dataflow nodes over the
 * scenario graph, runs the must/may analyses from the start scene and
 * derives continuity issues from the result:
 *
 *   - entity_not_introduced:      used as already known, but not guaranteed
 *                                 present on every path into the scene
 *   - entity_reintroduced:        introduced as new while already guaranteed
 *   - entity_incorrectly_removed: removed while not guaranteed present and
 *                                 not introduced in the same scene
 *
 * Only scenes reachable from the start scene are checked.
 */

import { breadthFirst } from '../graph/algorithms/search.js';
import {
  computeMayIntroducedSets,
  computeMustIntroducedSets,
  dataFlowNodesFromGraph,
} from '../graph/dataflow.js';
import type { DataFlowNode } from '../graph/dataflow.js';
import { debug, debugTimed } from '../shared/debug.js';
import { ScenarioGraphBuilder } from './graph-builder.js';
import type { ScenarioGraph } from './graph-builder.js';
import { entityKey } from './types.js';
import type {
  EntityType,
  Scenario,
  ScenarioClassifications,
  SceneEntityClassification,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export const CONTINUITY_ISSUE_TYPES = [
  'entity_not_introduced',
  'entity_reintroduced',
  'entity_incorrectly_removed',
] as const;

export type ContinuityIssueType = (typeof CONTINUITY_ISSUE_TYPES)[number];

export type IssueSeverity = 'low' | 'medium' | 'high';

export interface ContinuityIssue {
  issueType: ContinuityIssueType;
  severity: IssueSeverity;
  sceneId: string;
  entityName: string;
  entityType: EntityType;
  summary: string;
}

export interface TrackedEntity {
  /** Display name from the first classification that mentioned the entity */
  name: string;
  type: EntityType;
}

export interface GuaranteedEntityState {
  sceneId: string;
  guaranteedPresent: TrackedEntity[];
  possiblyPresent: TrackedEntity[];
  guaranteedAbsent: TrackedEntity[];
}

export interface EntityFlowAnalysis {
  startSceneId: string;
  graph: ScenarioGraph;
  nodes: ReadonlyMap<string, DataFlowNode<string>>;
  /** Entity keys guaranteed present at each scene (after the scene) */
  must: ReadonlyMap<string, ReadonlySet<string>>;
  /** Entity keys present on at least one path (after the scene) */
  may: ReadonlyMap<string, ReadonlySet<string>>;
  /** Every entity mentioned by any classification, keyed by entity key */
  entities: ReadonlyMap<string, TrackedEntity>;
}

// =============================================================================
// Dataflow Nodes
// =============================================================================

function introducedKeys(classifications: readonly SceneEntityClassification[]): string[] {
  return classifications
    .filter((c) => c.presentInScene
      && (c.introductionStatus === 'new' || c.introductionStatus === 'reintroduced'))
    .map((c) => entityKey(c.name));
}

function removedKeys(classifications: readonly SceneEntityClassification[]): string[] {
  return classifications
    .filter((c) => c.removalStatus === 'removed')
    .map((c) => entityKey(c.name));
}

/** Own entries only; scene ids such as `constructor` must not reach the prototype. */
function classificationsFor(
  classifications: ScenarioClassifications,
  sceneId: string,
): readonly SceneEntityClassification[] {
  return Object.hasOwn(classifications, sceneId) ? classifications[sceneId] ?? [] : [];
}

/**
 * Builds one dataflow node per scene. Introduced = present entities
 * classified `new` or `reintroduced`; removed = entities classified
 * `removed`. Scenes without classifications introduce and remove nothing.
 */
export function buildEntityDataFlowNodes(
  graph: ScenarioGraph,
  classifications: ScenarioClassifications,
): Map<string, DataFlowNode<string>> {
  return dataFlowNodesFromGraph(
    graph,
    (sceneId) => introducedKeys(classificationsFor(classifications, sceneId)),
    (sceneId) => removedKeys(classificationsFor(classifications, sceneId)),
  );
}

// =============================================================================
// Analysis
// =============================================================================

/**
 * Runs the must/may entity analyses from the scenario's start scene.
 * Returns null for a scenario without scenes.
 */
export function analyzeEntityFlow(
  scenario: Scenario,
  classifications: ScenarioClassifications,
  builder: ScenarioGraphBuilder = new ScenarioGraphBuilder(),
): EntityFlowAnalysis | null {
  const startSceneId = builder.findStartScene(scenario);
  if (startSceneId === null) return null;

  const graph = builder.build(scenario);
  const nodes = buildEntityDataFlowNodes(graph, classifications);

  const entities = new Map<string, TrackedEntity>();
  for (const list of Object.values(classifications)) {
    for (const c of list) {
      const k = entityKey(c.name);
      if (!entities.has(k)) entities.set(k, { name: c.name, type: c.type });
    }
  }

  return {
    startSceneId,
    graph,
    nodes,
    must: debugTimed('dataflow', 'Must-introduced sets', () => computeMustIntroducedSets(nodes, startSceneId)),
    may: debugTimed('dataflow', 'May-introduced sets', () => computeMayIntroducedSets(nodes, startSceneId)),
    entities,
  };
}

/**
 * Entities guaranteed present on entry to a scene: the intersection of the
 * predecessors' must sets. Empty for the start scene and for scenes without
 * predecessors.
 */
export function incomingMustSet(analysis: EntityFlowAnalysis, sceneId: string): Set<string> {
  const node = analysis.nodes.get(sceneId);
  if (node === undefined || sceneId === analysis.startSceneId) return new Set();

  let acc: Set<string> | null = null;
  for (const predId of node.predecessorIds) {
    const predSet = analysis.must.get(predId);
    if (predSet === undefined) continue;
    if (acc === null) {
      acc = new Set(predSet);
    } else {
      for (const item of acc) {
        if (!predSet.has(item)) acc.delete(item);
      }
    }
  }
  return acc ?? new Set();
}

// =============================================================================
// Continuity Checks
// =============================================================================

/**
 * Flags continuity issues in scenes reachable from the start scene, in
 * breadth-first scene order and classification order within a scene.
 */
export function checkEntityContinuity(
  scenario: Scenario,
  classifications: ScenarioClassifications,
  builder?: ScenarioGraphBuilder,
): ContinuityIssue[] {
  const analysis = analyzeEntityFlow(scenario, classifications, builder);
  if (analysis === null) return [];

  const issues: ContinuityIssue[] = [];

  for (const sceneId of breadthFirst(analysis.graph, [analysis.startSceneId])) {
    const sceneClassifications = classificationsFor(classifications, sceneId);
    if (sceneClassifications.length === 0) continue;

    const incoming = incomingMustSet(analysis, sceneId);
    const introducedHere = new Set(introducedKeys(sceneClassifications));

    for (const c of sceneClassifications) {
      const k = entityKey(c.name);
      const base = { sceneId, entityName: c.name, entityType: c.type };

      if (c.presentInScene && c.introductionStatus === 'already_known' && !incoming.has(k)) {
        issues.push({
          ...base,
          issueType: 'entity_not_introduced',
          severity: 'high',
          summary: `'${c.name}' is treated as known in scene '${sceneId}' but is not introduced on every path leading there`,
        });
      }

      if (c.presentInScene && c.introductionStatus === 'new' && incoming.has(k)) {
        issues.push({
          ...base,
          issueType: 'entity_reintroduced',
          severity: 'low',
          summary: `'${c.name}' is introduced as new in scene '${sceneId}' but is already present on every path leading there`,
        });
      }

      if (c.removalStatus === 'removed' && !incoming.has(k) && !introducedHere.has(k)) {
        issues.push({
          ...base,
          issueType: 'entity_incorrectly_removed',
          severity: 'medium',
          summary: `'${c.name}' is removed in scene '${sceneId}' but is not guaranteed to be present there`,
        });
      }
    }
  }

  debug('scenario', 'Entity continuity checked', { scenarioId: scenario.id, issues: issues.length });
  return issues;
}

// =============================================================================
// Guaranteed State
// =============================================================================

function toTracked(analysis: EntityFlowAnalysis, keys: Iterable<string>): TrackedEntity[] {
  const result: TrackedEntity[] = [];
  for (const k of [...keys].sort()) {
    const tracked = analysis.entities.get(k);
    if (tracked !== undefined) result.push(tracked);
  }
  return result;
}

/**
 * What is certain about entities after a scene, regardless of the path
 * taken: present on every path, present on some path, or absent on all
 * paths. Lists are sorted by entity key. Null for an unknown scene.
 */
export function getGuaranteedEntityState(
  analysis: EntityFlowAnalysis,
  sceneId: string,
): GuaranteedEntityState | null {
  const must = analysis.must.get(sceneId);
  const may = analysis.may.get(sceneId);
  if (must === undefined || may === undefined) return null;

  const possibly = [...may].filter((k) => !must.has(k));
  const absent = [...analysis.entities.keys()].filter((k) => !may.has(k) && !must.has(k));

  return {
    sceneId,
    guaranteedPresent: toTracked(analysis, must),
    possiblyPresent: toTracked(analysis, possibly),
    guaranteedAbsent: toTracked(analysis, absent),
  };
}
