/**
 * Scenario content model consumed by the engine.
 *
 * Scenarios come from the authoring layer as plain JSON. They are validated
 * with Zod at the boundary (parseScenario) and treated as read-only after
 * that. Empty-string scene references are treated the same as absent ones.
 */

import { z } from 'zod';

// =============================================================================
// Scenario / Scene / Branch
// =============================================================================

export const BranchSchema = z.object({
  choice: z.string().optional(),
  nextSceneId: z.string().nullable().optional(),
});

export const SceneSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  content: z.string().optional(),
  nextSceneId: z.string().nullable().optional(),
  branches: z.array(BranchSchema).default([]),
});

export const ScenarioSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  scenes: z.array(SceneSchema).default([]),
});

export type Branch = z.infer<typeof BranchSchema>;
export type Scene = z.infer<typeof SceneSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

/**
 * Validates raw scenario JSON.
 * @throws ZodError when the input does not match ScenarioSchema
 */
export function parseScenario(input: unknown): Scenario {
  return ScenarioSchema.parse(input);
}

/**
 * Normalizes an optional scene reference: null, undefined and '' all mean
 * "no target".
 */
export function sceneRef(id: string | null | undefined): string | null {
  return id === undefined || id === null || id === '' ? null : id;
}

// =============================================================================
// Scene Transitions (edge labels of scenario graphs)
// =============================================================================

export const TRANSITION_TYPES = ['linear', 'branch'] as const;

export type TransitionType = (typeof TRANSITION_TYPES)[number];

export interface SceneTransition {
  fromSceneId: string;
  toSceneId: string;
  transitionType: TransitionType;
  /** Present on branch transitions that carry choice text */
  choiceText?: string;
}

// =============================================================================
// Entity Classifications
// =============================================================================

export const ENTITY_TYPES = ['character', 'location', 'item', 'concept'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const INTRODUCTION_STATUSES = [
  'new',            // First appearance, introduced here
  'reintroduced',   // Brought back after an earlier removal
  'already_known',  // Used as if the reader already knows it
  'not_present',    // Mentioned by classification but absent from the scene
] as const;

export type IntroductionStatus = (typeof INTRODUCTION_STATUSES)[number];

export const REMOVAL_STATUSES = ['removed', 'not_removed'] as const;

export type RemovalStatus = (typeof REMOVAL_STATUSES)[number];

/**
 * How one entity is used in one scene. Produced upstream (typically by an
 * LLM-backed semantic role labeller) and consumed here as plain data.
 */
export const SceneEntityClassificationSchema = z.object({
  name: z.string().min(1),
  type: z.enum(ENTITY_TYPES),
  presentInScene: z.boolean().default(true),
  introductionStatus: z.enum(INTRODUCTION_STATUSES),
  removalStatus: z.enum(REMOVAL_STATUSES).default('not_removed'),
});

export type SceneEntityClassification = z.infer<typeof SceneEntityClassificationSchema>;

/** Classifications keyed by scene id. Scenes without an entry have none. */
export const ScenarioClassificationsSchema = z.record(
  z.string(),
  z.array(SceneEntityClassificationSchema),
);

export type ScenarioClassifications = z.infer<typeof ScenarioClassificationsSchema>;

/**
 * @throws ZodError when the input does not match ScenarioClassificationsSchema
 */
export function parseClassifications(input: unknown): ScenarioClassifications {
  return ScenarioClassificationsSchema.parse(input);
}

/**
 * Canonical entity key: trimmed, lower-cased name.
 */
export function entityKey(name: string): string {
  return name.trim().toLowerCase();
}
