/**
 * Types for dominator-path consistency evaluation.
 *
 * The evaluator itself (an LLM-backed service) lives outside this package:
 * it only has to implement PathConsistencyEvaluator. Its responses are
 * validated with Zod before use.
 */

import { z } from 'zod';

import type { GuaranteedEntityState } from '../scenario/entity-flow.js';
import type { ScenarioClassifications } from '../scenario/types.js';

// =============================================================================
// Evaluator Contract
// =============================================================================

export const EvaluationIssueSchema = z.object({
  issueType: z.string().min(1),
  severity: z.enum(['low', 'medium', 'high']).default('medium'),
  sceneIds: z.array(z.string()).default([]),
  entityName: z.string().optional(),
  summary: z.string(),
});

export const PathEvaluationSchema = z.object({
  isConsistent: z.boolean(),
  score: z.number().min(0).max(1),
  issues: z.array(EvaluationIssueSchema).default([]),
});

export type EvaluationIssue = z.infer<typeof EvaluationIssueSchema>;
export type PathEvaluation = z.infer<typeof PathEvaluationSchema>;

/** What an evaluator may return: defaults are filled in during validation. */
export type PathEvaluationInput = z.input<typeof PathEvaluationSchema>;

export interface PathEvaluationRequest {
  scenarioId: string;
  sceneIds: string[];
  /** Scene titles and contents along the path, blank-line separated */
  content: string;
}

export interface PathConsistencyEvaluator {
  evaluate(request: PathEvaluationRequest): Promise<PathEvaluationInput>;
}

// =============================================================================
// Path Selection
// =============================================================================

export type PathSource = 'dominator_chain' | 'state_space';

export interface RepresentativePath {
  sceneIds: string[];
  /** Last scene of the path */
  targetSceneId: string;
  immediateDominatorId: string | null;
  source: PathSource;
}

// =============================================================================
// Service Request / Response
// =============================================================================

export interface EvaluateDominatorPathsRequest {
  /** Default: every ending scene */
  targetSceneIds?: string[];
  /** Per-scene entity classifications; enables entity tracking and checks */
  classifications?: ScenarioClassifications;
  /** Also select compressed paths through the entity state space (default true) */
  includeStateSpacePaths?: boolean;
  /** Default: dominatorPaths.maxPaths from analysis.json */
  maxPaths?: number;
}

export interface DominatorPathAnalysisResult extends RepresentativePath {
  isConsistent: boolean;
  score: number;
  issues: EvaluationIssue[];
  guaranteedEntityState: GuaranteedEntityState | null;
  error?: string;
}

export type OverallAssessment = 'ok' | 'has_issues' | 'failed';

export interface EvaluateDominatorPathsResponse {
  scenarioId: string;
  isSuccessful: boolean;
  overallAssessment: OverallAssessment;
  pathResults: DominatorPathAnalysisResult[];
  /** Evaluator issues across all paths, then entity continuity issues */
  issues: EvaluationIssue[];
  evaluatedAt: string;
}
