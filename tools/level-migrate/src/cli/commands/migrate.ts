import { Command } from 'commander';
import { migrateLevels } from '../logic/migrate.js';
import { exitCodeFor } from '../../runner/runner.js';
import { createLogger } from '../../logger.js';
import { exitWithError, formatJson, writeOutput } from '../utils/output.js';
import { addMigrationOptions, toOverrides } from './shared.js';
import type { MigrationCommandOptions } from './shared.js';

interface MigrateCommandOptions extends MigrationCommandOptions {
  steps?: string;
}

function parseStepList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export const migrateCommand = addMigrationOptions(
  new Command('migrate')
    .description('Run the migration chain (all steps, or --steps) over every level file')
    .option('--steps <names>', 'Comma-separated step names; applied in chain order'),
).action((options: MigrateCommandOptions) => {
  try {
    const report = migrateLevels({
      steps: parseStepList(options.steps),
      dryRun: options.dryRun,
      overrides: toOverrides(options),
      logger: createLogger(options.verbose),
    });

    writeOutput(formatJson(report, options.pretty), options.output);
    process.exit(exitCodeFor(report));
  } catch (err) {
    exitWithError(err);
  }
});
