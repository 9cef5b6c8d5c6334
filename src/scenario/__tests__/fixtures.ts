import { parseClassifications, parseScenario } from '../types.js';
import type { Scenario, ScenarioClassifications } from '../types.js';

/**
 * gate -> hall; hall branches "left" to library and "right" to kitchen;
 * both rejoin at finale.
 */
export function manorScenario(): Scenario {
  return parseScenario({
    id: 'manor',
    title: 'The Manor',
    scenes: [
      { id: 'gate', title: 'Gate', content: 'Mira waits at the gate.', nextSceneId: 'hall' },
      {
        id: 'hall',
        title: 'Hall',
        branches: [
          { choice: 'left', nextSceneId: 'library' },
          { choice: 'right', nextSceneId: 'kitchen' },
        ],
      },
      { id: 'library', title: 'Library', nextSceneId: 'finale' },
      { id: 'kitchen', title: 'Kitchen', nextSceneId: 'finale' },
      { id: 'finale', title: 'Finale', content: 'The end.' },
    ],
  });
}

/**
 * Mira is introduced at the gate and again at the hall; the lantern is lost
 * in the library; the cook only exists on the kitchen route; the ghost is
 * removed at the finale without ever appearing.
 */
export function manorClassifications(): ScenarioClassifications {
  return parseClassifications({
    gate: [
      { name: 'Mira', type: 'character', introductionStatus: 'new' },
    ],
    hall: [
      { name: 'Lantern', type: 'item', introductionStatus: 'new' },
      { name: 'Mira', type: 'character', introductionStatus: 'new' },
    ],
    library: [
      { name: 'Book', type: 'item', introductionStatus: 'new' },
      { name: 'lantern', type: 'item', introductionStatus: 'already_known', removalStatus: 'removed' },
    ],
    kitchen: [
      { name: 'Cook', type: 'character', introductionStatus: 'new' },
    ],
    finale: [
      { name: 'Mira', type: 'character', introductionStatus: 'already_known' },
      { name: 'Lantern', type: 'item', introductionStatus: 'already_known' },
      { name: 'Cook', type: 'character', introductionStatus: 'already_known' },
      {
        name: 'Ghost',
        type: 'character',
        presentInScene: false,
        introductionStatus: 'not_present',
        removalStatus: 'removed',
      },
    ],
  });
}
