import type { JsonObject } from '../types/level.js';
import type { MigrationStep, PipelineOutcome, StepContext, StepName } from './types.js';

export const DEFAULT_STEP_CONTEXT: StepContext = {
  strictAngles: false,
};

/**
 * Apply steps to a document one after another.
 * Errors from any step propagate; the input is never mutated.
 */
export function applySteps(
  document: JsonObject,
  steps: readonly MigrationStep[],
  context: StepContext = DEFAULT_STEP_CONTEXT,
): PipelineOutcome {
  let current = document;
  const appliedSteps: StepName[] = [];
  const warnings: string[] = [];

  for (const step of steps) {
    const outcome = step.apply(current, context);
    warnings.push(...outcome.warnings.map((w) => `[${step.name}] ${w}`));
    if (outcome.changed) {
      appliedSteps.push(step.name);
      current = outcome.document;
    }
  }

  return { document: current, appliedSteps, warnings };
}
