import { Command } from 'commander';
import { MIGRATION_STEPS } from '../../migration/steps/index.js';
import { formatJson, writeOutput } from '../utils/output.js';

export const listStepsCommand = new Command('list-steps')
  .description('List migration steps in chain order')
  .option('--pretty', 'Pretty-print JSON output', false)
  .action((options: { pretty: boolean }) => {
    const steps = MIGRATION_STEPS.map((step) => ({
      name: step.name,
      description: step.description,
    }));
    writeOutput(formatJson({ steps }, options.pretty));
  });
