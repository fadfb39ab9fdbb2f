import type { Command } from 'commander';
import type { ConfigOverrides } from '../../config/loader.js';

/**
 * Options every migration command accepts, as parsed by commander.
 */
export interface MigrationCommandOptions {
  levels?: string;
  dryRun: boolean;
  strictAngles?: boolean;
  verbose: boolean;
  pretty: boolean;
  output?: string;
}

export function addMigrationOptions(command: Command): Command {
  return command
    .option('--levels <dir>', 'Levels directory (default: from config, or ./levels)')
    .option('--dry-run', 'Report what would change without writing files', false)
    .option('--strict-angles', 'Fail files whose stored ray angle differs from the path-derived one')
    .option('--verbose', 'Log skipped files too', false)
    .option('--pretty', 'Pretty-print JSON output', false)
    .option('-o, --output <file>', 'Write output to file instead of stdout');
}

export function toOverrides(options: { levels?: string; strictAngles?: boolean }): ConfigOverrides {
  return {
    ...(options.levels !== undefined ? { levelsDir: options.levels } : {}),
    ...(options.strictAngles !== undefined ? { strictAngles: options.strictAngles } : {}),
  };
}
