import { Command } from 'commander';
import { migrateLevels } from '../logic/migrate.js';
import { exitCodeFor } from '../../runner/runner.js';
import { createLogger } from '../../logger.js';
import type { MigrationStep } from '../../migration/types.js';
import { exitWithError, formatJson, writeOutput } from '../utils/output.js';
import { addMigrationOptions, toOverrides } from './shared.js';
import type { MigrationCommandOptions } from './shared.js';

/**
 * A command that runs a single step, named after it.
 */
export function createStepCommand(step: MigrationStep): Command {
  return addMigrationOptions(new Command(step.name).description(step.description)).action(
    (options: MigrationCommandOptions) => {
      try {
        const report = migrateLevels({
          steps: [step.name],
          dryRun: options.dryRun,
          overrides: toOverrides(options),
          logger: createLogger(options.verbose),
        });

        writeOutput(formatJson(report, options.pretty), options.output);
        process.exit(exitCodeFor(report));
      } catch (err) {
        exitWithError(err);
      }
    },
  );
}
