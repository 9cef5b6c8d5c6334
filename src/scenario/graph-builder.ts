/**
 * Builds the scene-transition graph of a scenario and enumerates its
 * playthrough paths.
 *
 * Every scene becomes a node (scenes without outgoing references included).
 * Each linear "next scene" reference and each branch with a target becomes
 * an edge labelled with a SceneTransition.
 */

import { loadAnalysisConfig } from '../config/analysis-config.js';
import { enumeratePaths } from '../graph/algorithms/paths.js';
import { DirectedGraph } from '../graph/directed-graph.js';
import { edge } from '../graph/types.js';
import type { Edge } from '../graph/types.js';
import { debug } from '../shared/debug.js';
import { sceneRef } from './types.js';
import type { Scenario, SceneTransition } from './types.js';

export type ScenarioGraph = DirectedGraph<string, SceneTransition>;

export class ScenarioGraphBuilder {
  private readonly defaultMaxPaths: number;

  /**
   * @param defaultMaxPaths - Path cap used when enumerateAllPaths() gets none
   *   (default: pathEnumeration.maxPaths from analysis.json, 100 out of the box)
   */
  constructor(defaultMaxPaths?: number) {
    this.defaultMaxPaths = defaultMaxPaths ?? loadAnalysisConfig().pathEnumeration.maxPaths;
  }

  build(scenario: Scenario): ScenarioGraph {
    const edges: Edge<string, SceneTransition>[] = [];

    for (const scene of scenario.scenes) {
      const next = sceneRef(scene.nextSceneId);
      if (next !== null) {
        edges.push(edge(scene.id, next, {
          fromSceneId: scene.id,
          toSceneId: next,
          transitionType: 'linear',
        }));
      }

      for (const branch of scene.branches) {
        const target = sceneRef(branch.nextSceneId);
        if (target === null) continue;

        const transition: SceneTransition = {
          fromSceneId: scene.id,
          toSceneId: target,
          transitionType: 'branch',
        };
        if (branch.choice !== undefined) {
          transition.choiceText = branch.choice;
        }
        edges.push(edge(scene.id, target, transition));
      }
    }

    return DirectedGraph.fromEdges(edges, { nodes: scenario.scenes.map((s) => s.id) });
  }

  /**
   * The first scene no other scene targets. Falls back to the first scene
   * when every scene is targeted (e.g. a cycle through the opening scene).
   * This is a heuristic: with several untargeted scenes the earliest one in
   * scenario order wins. Null only for a scenario with no scenes.
   */
  findStartScene(scenario: Scenario): string | null {
    if (scenario.scenes.length === 0) return null;

    const targets = new Set<string>();
    for (const scene of scenario.scenes) {
      const next = sceneRef(scene.nextSceneId);
      if (next !== null) targets.add(next);
      for (const branch of scene.branches) {
        const target = sceneRef(branch.nextSceneId);
        if (target !== null) targets.add(target);
      }
    }

    const start = scenario.scenes.find((s) => !targets.has(s.id));
    return (start ?? scenario.scenes[0]).id;
  }

  /** Scenes with neither a linear successor nor a branch with a target. */
  findEndingScenes(scenario: Scenario): string[] {
    return scenario.scenes
      .filter((scene) =>
        sceneRef(scene.nextSceneId) === null
        && scene.branches.every((b) => sceneRef(b.nextSceneId) === null))
      .map((scene) => scene.id);
  }

  /**
   * Enumerates playthrough paths from the start scene to ending scenes.
   *
   * `maxPaths` bounds both path depth and the number of paths taken from the
   * depth-first search, cut-off paths included, so the work on a cyclic
   * scenario stays bounded. A path cut off by the depth bound does not end
   * at an ending scene and is dropped. Returns [] when there is no start or
   * no ending.
   */
  enumerateAllPaths(scenario: Scenario, maxPaths: number = this.defaultMaxPaths): string[][] {
    const graph = this.build(scenario);
    const start = this.findStartScene(scenario);
    const endings = new Set(this.findEndingScenes(scenario));

    if (start === null || endings.size === 0 || maxPaths <= 0) {
      debug('scenario', 'No paths to enumerate', { scenarioId: scenario.id, start, endings: endings.size });
      return [];
    }

    const paths: string[][] = [];
    let taken = 0;
    for (const path of enumeratePaths(graph, start, {
      isTerminal: (node) => endings.has(node),
      maxDepth: maxPaths,
    })) {
      taken++;
      if (endings.has(path[path.length - 1])) paths.push(path);
      if (taken >= maxPaths) break;
    }

    debug('scenario', 'Enumerated paths', { scenarioId: scenario.id, taken, paths: paths.length });
    return paths;
  }
}
