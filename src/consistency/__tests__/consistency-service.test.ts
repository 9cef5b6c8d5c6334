import { describe, it, expect, vi } from 'vitest';

import { DEFAULT_ANALYSIS_CONFIG } from '../../config/analysis-config.js';
import { ScenarioGraphBuilder } from '../../scenario/graph-builder.js';
import { parseScenario } from '../../scenario/types.js';
import { manorClassifications, manorScenario } from '../../scenario/__tests__/fixtures.js';
import { buildPathContent, ScenarioConsistencyService } from '../consistency-service.js';
import type {
  PathConsistencyEvaluator,
  PathEvaluationInput,
  PathEvaluationRequest,
} from '../types.js';

// =============================================================================
// Test Helpers
// =============================================================================

function fakeEvaluator(
  impl: (request: PathEvaluationRequest) => Promise<PathEvaluationInput> =
  async () => ({ isConsistent: true, score: 0.9 }),
) {
  const evaluate = vi.fn(impl);
  const evaluator: PathConsistencyEvaluator = { evaluate };
  return { evaluator, evaluate };
}

function service(evaluator: PathConsistencyEvaluator): ScenarioConsistencyService {
  return new ScenarioConsistencyService(evaluator, {
    config: DEFAULT_ANALYSIS_CONFIG,
    builder: new ScenarioGraphBuilder(100),
  });
}

// =============================================================================
// buildPathContent
// =============================================================================

describe('buildPathContent', () => {
  it('joins titles and contents along the path', () => {
    expect(buildPathContent(manorScenario(), ['gate', 'hall', 'finale'])).toBe(
      'Gate\nMira waits at the gate.\n\nHall\n\nFinale\nThe end.',
    );
  });

  it('skips unknown and empty scenes', () => {
    const scenario = parseScenario({ id: 's', scenes: [{ id: 'blank', title: '  ' }, { id: 'named', title: 'Named' }] });
    expect(buildPathContent(scenario, ['blank', 'missing', 'named'])).toBe('Named');
  });
});

// =============================================================================
// evaluate
// =============================================================================

describe('ScenarioConsistencyService.evaluate', () => {
  it('evaluates every selected path and reports ok when all pass', async () => {
    const { evaluator, evaluate } = fakeEvaluator();

    const response = await service(evaluator).evaluate(manorScenario());

    expect(evaluate).toHaveBeenCalledTimes(3);
    expect(evaluate).toHaveBeenNthCalledWith(1, {
      scenarioId: 'manor',
      sceneIds: ['gate', 'hall', 'finale'],
      content: 'Gate\nMira waits at the gate.\n\nHall\n\nFinale\nThe end.',
    });
    expect(response.scenarioId).toBe('manor');
    expect(response.isSuccessful).toBe(true);
    expect(response.overallAssessment).toBe('ok');
    expect(response.issues).toEqual([]);
    expect(response.pathResults.map((r) => r.source)).toEqual(['dominator_chain', 'state_space', 'state_space']);
    expect(response.pathResults[0]).toMatchObject({ isConsistent: true, score: 0.9, guaranteedEntityState: null });
  });

  it('keeps state-space paths finite when side scenes loop back to a hub', async () => {
    const scenario = parseScenario({
      id: 'hub',
      scenes: [
        {
          id: 'hub',
          branches: [
            { choice: 'west', nextSceneId: 'L' },
            { choice: 'east', nextSceneId: 'R' },
            { choice: 'out', nextSceneId: 'E' },
          ],
        },
        { id: 'L', nextSceneId: 'hub' },
        { id: 'R', nextSceneId: 'hub' },
        { id: 'E' },
      ],
    });
    const { evaluator, evaluate } = fakeEvaluator();

    const response = await service(evaluator).evaluate(scenario);

    // The only loop-free state path repeats the dominator chain
    expect(evaluate.mock.calls.map(([request]) => request.sceneIds)).toEqual([['hub', 'E']]);
    expect(response.pathResults.map((r) => r.source)).toEqual(['dominator_chain']);
  });

  it('evaluates only dominator chains when state-space paths are turned off', async () => {
    const { evaluator, evaluate } = fakeEvaluator();
    const response = await service(evaluator).evaluate(manorScenario(), { includeStateSpacePaths: false });
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(response.pathResults).toHaveLength(1);
  });

  it('appends entity continuity issues and attaches guaranteed state', async () => {
    const { evaluator } = fakeEvaluator();

    const response = await service(evaluator).evaluate(manorScenario(), {
      classifications: manorClassifications(),
    });

    expect(response.overallAssessment).toBe('has_issues');
    expect(response.isSuccessful).toBe(true);
    expect(response.issues.map((i) => [i.issueType, i.sceneIds, i.entityName])).toEqual([
      ['entity_reintroduced', ['hall'], 'Mira'],
      ['entity_not_introduced', ['finale'], 'Lantern'],
      ['entity_not_introduced', ['finale'], 'Cook'],
      ['entity_incorrectly_removed', ['finale'], 'Ghost'],
    ]);
    expect(response.pathResults[0].guaranteedEntityState?.guaranteedPresent).toEqual([
      { name: 'Mira', type: 'character' },
    ]);
  });

  it('treats a score under the pass threshold as inconsistent', async () => {
    const { evaluator } = fakeEvaluator(async () => ({ isConsistent: true, score: 0.5 }));
    const response = await service(evaluator).evaluate(manorScenario(), { includeStateSpacePaths: false });
    expect(response.pathResults[0].isConsistent).toBe(false);
    expect(response.overallAssessment).toBe('has_issues');
  });

  it('collects evaluator issues with defaults filled in', async () => {
    const { evaluator } = fakeEvaluator(async () => ({
      isConsistent: false,
      score: 0.2,
      issues: [{ issueType: 'timeline', summary: 'Night falls twice' }],
    }));

    const response = await service(evaluator).evaluate(manorScenario(), { includeStateSpacePaths: false });

    expect(response.issues).toEqual([
      { issueType: 'timeline', severity: 'medium', sceneIds: [], summary: 'Night falls twice' },
    ]);
  });

  it('records a failing path and keeps evaluating the rest', async () => {
    const evaluate = vi.fn<(request: PathEvaluationRequest) => Promise<PathEvaluationInput>>()
      .mockResolvedValueOnce({ isConsistent: true, score: 1 })
      .mockRejectedValueOnce(new Error('evaluator offline'))
      .mockResolvedValue({ isConsistent: true, score: 1 });

    const response = await service({ evaluate }).evaluate(manorScenario());

    expect(evaluate).toHaveBeenCalledTimes(3);
    expect(response.pathResults.map((r) => r.error)).toEqual([undefined, 'evaluator offline', undefined]);
    expect(response.pathResults[1]).toMatchObject({ isConsistent: false, score: 0 });
    expect(response.isSuccessful).toBe(false);
    expect(response.overallAssessment).toBe('has_issues');
  });

  it('reports failed when every path errors', async () => {
    const { evaluator } = fakeEvaluator(async () => {
      throw new Error('evaluator offline');
    });
    const response = await service(evaluator).evaluate(manorScenario());
    expect(response.overallAssessment).toBe('failed');
    expect(response.isSuccessful).toBe(false);
  });

  it('rejects evaluator output that does not validate', async () => {
    const { evaluator } = fakeEvaluator(async () => ({ isConsistent: true, score: 2 }));
    const response = await service(evaluator).evaluate(manorScenario(), { includeStateSpacePaths: false });
    expect(response.pathResults[0].error).toBeDefined();
    expect(response.pathResults[0].score).toBe(0);
    expect(response.overallAssessment).toBe('failed');
  });

  it('reports ok with no paths for a scenario without scenes', async () => {
    const { evaluator, evaluate } = fakeEvaluator();
    const response = await service(evaluator).evaluate(parseScenario({ id: 'empty' }));
    expect(evaluate).not.toHaveBeenCalled();
    expect(response.pathResults).toEqual([]);
    expect(response.overallAssessment).toBe('ok');
  });
});

// =============================================================================
// Single Paths and Queries
// =============================================================================

describe('ScenarioConsistencyService single-path queries', () => {
  it('evaluates the dominator chain of one scene', async () => {
    const { evaluator, evaluate } = fakeEvaluator();

    const result = await service(evaluator).evaluateDominatorPath(manorScenario(), 'kitchen');

    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({
      sceneIds: ['gate', 'hall', 'kitchen'],
      targetSceneId: 'kitchen',
      immediateDominatorId: 'hall',
      isConsistent: true,
    });
  });

  it('returns an error result for an unreachable scene without calling the evaluator', async () => {
    const { evaluator, evaluate } = fakeEvaluator();

    const result = await service(evaluator).evaluateDominatorPath(manorScenario(), 'attic');

    expect(evaluate).not.toHaveBeenCalled();
    expect(result.error).toBe("Scene 'attic' is not reachable from the start scene");
    expect(result.sceneIds).toEqual([]);
  });

  it('exposes the dominator tree and guaranteed entity state', () => {
    const { evaluator } = fakeEvaluator();
    const svc = service(evaluator);

    expect(svc.computeDominatorTree(manorScenario()).get('finale')).toBe('hall');
    expect(svc.getGuaranteedEntityState(manorScenario(), manorClassifications(), 'kitchen')).toEqual({
      sceneId: 'kitchen',
      guaranteedPresent: [
        { name: 'Cook', type: 'character' },
        { name: 'Lantern', type: 'item' },
        { name: 'Mira', type: 'character' },
      ],
      possiblyPresent: [],
      guaranteedAbsent: [
        { name: 'Book', type: 'item' },
        { name: 'Ghost', type: 'character' },
      ],
    });
  });
});
