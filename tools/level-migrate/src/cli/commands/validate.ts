import { Command } from 'commander';
import { validateLevels } from '../logic/validate.js';
import { exitWithError, formatJson, writeOutput } from '../utils/output.js';
import { toOverrides } from './shared.js';

interface ValidateCommandOptions {
  levels?: string;
  pretty: boolean;
  output?: string;
}

export const validateCommand = new Command('validate')
  .description('Validate level files against the canonical schema')
  .option('--levels <dir>', 'Levels directory (default: from config, or ./levels)')
  .option('--pretty', 'Pretty-print JSON output', false)
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action((options: ValidateCommandOptions) => {
    try {
      const result = validateLevels({ overrides: toOverrides(options) });
      writeOutput(formatJson(result, options.pretty), options.output);
      process.exit(result.valid ? 0 : 1);
    } catch (err) {
      exitWithError(err);
    }
  });
