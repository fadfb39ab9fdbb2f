import type { MigrationStep, StepName } from '../types.js';
import { STEP_NAMES } from '../types.js';
import { unifyKindsStep } from './unify-kinds.js';
import { fixCycleTimesStep } from './fix-cycle-times.js';
import { buttonPositionsStep } from './button-positions.js';
import { endpointArraysStep } from './endpoint-arrays.js';
import { removeAnglesStep } from './remove-angles.js';
import { renamePhaseStep } from './rename-phase.js';

/** Every step, in the order the schema history applied them. */
export const MIGRATION_STEPS: readonly MigrationStep[] = [
  unifyKindsStep,
  fixCycleTimesStep,
  buttonPositionsStep,
  endpointArraysStep,
  removeAnglesStep,
  renamePhaseStep,
];

export function isStepName(name: string): name is StepName {
  const known: readonly string[] = STEP_NAMES;
  return known.includes(name);
}

/** Get a step by name, or null if there is none. */
export function getStep(name: string): MigrationStep | null {
  return MIGRATION_STEPS.find((step) => step.name === name) ?? null;
}

/**
 * Resolve step names to steps in chain order, whatever order they were
 * given in. An empty list selects every step.
 *
 * @throws If a name does not match any step.
 */
export function resolveSteps(names: readonly string[]): MigrationStep[] {
  if (names.length === 0) return [...MIGRATION_STEPS];

  const unknown = names.filter((name) => !isStepName(name));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown migration step(s): ${unknown.join(', ')}. Known steps: ${STEP_NAMES.join(', ')}`,
    );
  }

  const wanted = new Set(names);
  return MIGRATION_STEPS.filter((step) => wanted.has(step.name));
}

export { unifyKindsStep } from './unify-kinds.js';
export { fixCycleTimesStep } from './fix-cycle-times.js';
export { buttonPositionsStep } from './button-positions.js';
export { endpointArraysStep } from './endpoint-arrays.js';
export { removeAnglesStep } from './remove-angles.js';
export { renamePhaseStep } from './rename-phase.js';
