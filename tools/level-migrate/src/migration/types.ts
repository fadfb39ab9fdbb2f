/**
 * Types for the level schema migration chain.
 */

import type { JsonObject } from '../types/level.js';

export const STEP_NAMES = [
  'unify-kinds',
  'fix-cycle-times',
  'button-positions',
  'endpoint-arrays',
  'remove-angles',
  'rename-phase',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

/**
 * Options shared by every step.
 */
export interface StepContext {
  /** Fail a file whose stored ray angle differs from the path-derived one. */
  strictAngles: boolean;
}

/**
 * Result of applying one step to one document.
 */
export interface StepOutcome {
  /** The migrated document, or the input itself when nothing changed. */
  document: JsonObject;
  changed: boolean;
  warnings: string[];
}

/**
 * A single idempotent schema transformation.
 *
 * `apply` never mutates its input. When `needsMigration` is false it returns
 * the input document with `changed: false`.
 */
export interface MigrationStep {
  name: StepName;
  description: string;
  needsMigration(document: JsonObject): boolean;
  apply(document: JsonObject, context: StepContext): StepOutcome;
}

/**
 * Result of running a sequence of steps over one document.
 */
export interface PipelineOutcome {
  document: JsonObject;
  /** Names of the steps that changed the document, in the order applied. */
  appliedSteps: StepName[];
  warnings: string[];
}
