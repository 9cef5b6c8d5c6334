/**
 * Dominator-path consistency evaluation.
 *
 * Selects representative paths through a scenario, hands each one to an
 * external PathConsistencyEvaluator and aggregates the verdicts. When entity
 * classifications are supplied, each path result also carries the
 * guaranteed entity state at its last scene, and entity continuity issues
 * found by the dataflow analysis are appended to the response.
 *
 * Paths are evaluated one at a time. An evaluator failure on one path is
 * recorded on that path's result and marks the response unsuccessful; the
 * remaining paths are still evaluated.
 */

import { loadAnalysisConfig } from '../config/analysis-config.js';
import type { AnalysisConfig } from '../config/analysis-config.js';
import { debug } from '../shared/debug.js';
import {
  analyzeEntityFlow,
  checkEntityContinuity,
  getGuaranteedEntityState,
} from '../scenario/entity-flow.js';
import type { EntityFlowAnalysis, GuaranteedEntityState } from '../scenario/entity-flow.js';
import { ScenarioGraphBuilder } from '../scenario/graph-builder.js';
import { exploreScenarioStates } from '../scenario/state-exploration.js';
import type { Scenario, ScenarioClassifications } from '../scenario/types.js';
import { computeDominatorTree, selectDominatorPaths } from './path-selection.js';
import { PathEvaluationSchema } from './types.js';
import type {
  DominatorPathAnalysisResult,
  EvaluateDominatorPathsRequest,
  EvaluateDominatorPathsResponse,
  EvaluationIssue,
  OverallAssessment,
  PathConsistencyEvaluator,
  RepresentativePath,
} from './types.js';

export interface ConsistencyServiceOptions {
  /** Default: loadAnalysisConfig() */
  config?: AnalysisConfig;
  builder?: ScenarioGraphBuilder;
}

/**
 * Concatenates scene titles and contents along a path. Scenes contribute
 * "title\ncontent" (whichever parts are non-empty); scenes are separated by
 * a blank line. Unknown and empty scenes are skipped.
 */
export function buildPathContent(scenario: Scenario, sceneIds: readonly string[]): string {
  const byId = new Map(scenario.scenes.map((s) => [s.id, s]));
  const blocks: string[] = [];
  for (const id of sceneIds) {
    const scene = byId.get(id);
    if (scene === undefined) continue;
    const block = [scene.title, scene.content]
      .filter((part): part is string => part !== undefined && part.trim() !== '')
      .join('\n');
    if (block !== '') blocks.push(block);
  }
  return blocks.join('\n\n');
}

export class ScenarioConsistencyService {
  private readonly evaluator: PathConsistencyEvaluator;
  private readonly config: AnalysisConfig;
  private readonly builder: ScenarioGraphBuilder;

  constructor(evaluator: PathConsistencyEvaluator, options: ConsistencyServiceOptions = {}) {
    this.evaluator = evaluator;
    this.config = options.config ?? loadAnalysisConfig();
    this.builder = options.builder ?? new ScenarioGraphBuilder(this.config.pathEnumeration.maxPaths);
  }

  /**
   * Evaluates every selected representative path of the scenario.
   */
  async evaluate(
    scenario: Scenario,
    request: EvaluateDominatorPathsRequest = {},
  ): Promise<EvaluateDominatorPathsResponse> {
    const classifications = request.classifications;
    const analysis = classifications !== undefined
      ? analyzeEntityFlow(scenario, classifications, this.builder)
      : null;

    const stateGraph = request.includeStateSpacePaths !== false
      ? exploreScenarioStates(scenario, classifications ?? {}, {
        builder: this.builder,
        maxDepth: this.config.stateSpace.maxDepth,
      })
      : null;

    const paths = selectDominatorPaths(scenario, {
      builder: this.builder,
      maxPaths: request.maxPaths ?? this.config.dominatorPaths.maxPaths,
      targetSceneIds: request.targetSceneIds,
      stateGraph,
      maxDepth: this.config.stateSpace.maxDepth,
    });

    const pathResults: DominatorPathAnalysisResult[] = [];
    for (const path of paths) {
      pathResults.push(await this.evaluatePath(scenario, path, analysis));
    }

    const issues: EvaluationIssue[] = pathResults.flatMap((r) => r.issues);
    if (classifications !== undefined) {
      for (const issue of checkEntityContinuity(scenario, classifications, this.builder)) {
        issues.push({
          issueType: issue.issueType,
          severity: issue.severity,
          sceneIds: [issue.sceneId],
          entityName: issue.entityName,
          summary: issue.summary,
        });
      }
    }

    const failed = pathResults.filter((r) => r.error !== undefined).length;
    let overallAssessment: OverallAssessment = 'ok';
    if (failed > 0 && failed === pathResults.length) {
      overallAssessment = 'failed';
    } else if (issues.length > 0 || pathResults.some((r) => !r.isConsistent)) {
      overallAssessment = 'has_issues';
    }

    debug('consistency', 'Scenario evaluated', {
      scenarioId: scenario.id,
      paths: pathResults.length,
      failed,
      issues: issues.length,
      overallAssessment,
    });

    return {
      scenarioId: scenario.id,
      isSuccessful: failed === 0,
      overallAssessment,
      pathResults,
      issues,
      evaluatedAt: new Date().toISOString(),
    };
  }

  /**
   * Evaluates the dominator chain leading to one scene. A scene that is not
   * reachable from the start scene yields an error result without calling
   * the evaluator.
   */
  async evaluateDominatorPath(
    scenario: Scenario,
    targetSceneId: string,
    classifications?: ScenarioClassifications,
  ): Promise<DominatorPathAnalysisResult> {
    const [path] = selectDominatorPaths(scenario, {
      builder: this.builder,
      maxPaths: 1,
      targetSceneIds: [targetSceneId],
    });

    if (path === undefined) {
      return {
        sceneIds: [],
        targetSceneId,
        immediateDominatorId: null,
        source: 'dominator_chain',
        isConsistent: false,
        score: 0,
        issues: [],
        guaranteedEntityState: null,
        error: `Scene '${targetSceneId}' is not reachable from the start scene`,
      };
    }

    const analysis = classifications !== undefined
      ? analyzeEntityFlow(scenario, classifications, this.builder)
      : null;
    return this.evaluatePath(scenario, path, analysis);
  }

  /** Scene id → immediate dominator id (null for the start scene). */
  computeDominatorTree(scenario: Scenario): Map<string, string | null> {
    return computeDominatorTree(scenario, this.builder);
  }

  getGuaranteedEntityState(
    scenario: Scenario,
    classifications: ScenarioClassifications,
    sceneId: string,
  ): GuaranteedEntityState | null {
    const analysis = analyzeEntityFlow(scenario, classifications, this.builder);
    return analysis === null ? null : getGuaranteedEntityState(analysis, sceneId);
  }

  private async evaluatePath(
    scenario: Scenario,
    path: RepresentativePath,
    analysis: EntityFlowAnalysis | null,
  ): Promise<DominatorPathAnalysisResult> {
    const guaranteedEntityState = analysis !== null
      ? getGuaranteedEntityState(analysis, path.targetSceneId)
      : null;

    try {
      const raw = await this.evaluator.evaluate({
        scenarioId: scenario.id,
        sceneIds: path.sceneIds,
        content: buildPathContent(scenario, path.sceneIds),
      });
      const evaluation = PathEvaluationSchema.parse(raw);

      return {
        ...path,
        isConsistent: evaluation.isConsistent && evaluation.score >= this.config.consistency.passThreshold,
        score: evaluation.score,
        issues: evaluation.issues,
        guaranteedEntityState,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      debug('consistency', 'Path evaluation failed', {
        scenarioId: scenario.id,
        target: path.targetSceneId,
        error: message,
      });
      return {
        ...path,
        isConsistent: false,
        score: 0,
        issues: [],
        guaranteedEntityState,
        error: message,
      };
    }
  }
}
