import { loadConfig } from '../../config/loader.js';
import type { ConfigOverrides } from '../../config/loader.js';
import { resolveSteps } from '../../migration/steps/index.js';
import { discoverLevelFiles } from '../../runner/discovery.js';
import { runMigration } from '../../runner/runner.js';
import type { MigrationReport, RunnerDeps } from '../../runner/runner.js';
import type { Logger } from '../../logger.js';

export interface MigrateLevelsInput {
  /** Step names to run; empty runs the whole chain. */
  steps: readonly string[];
  dryRun: boolean;
  overrides?: ConfigOverrides;
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/**
 * Resolve config and steps, find level files, and migrate them.
 *
 * The CLI wrapper handles option parsing, output and exit codes.
 *
 * @throws On fatal problems: bad config, unknown step, missing levels
 *   directory, or no level files. Per-file failures land in the report.
 */
export function migrateLevels(
  input: MigrateLevelsInput,
  deps: Partial<RunnerDeps> = {},
): MigrationReport {
  const config = loadConfig({ cwd: input.cwd, env: input.env, overrides: input.overrides });
  const steps = resolveSteps(input.steps);

  const files = discoverLevelFiles(config.levelsDir);
  if (files.length === 0) {
    throw new Error(`No level files found in ${config.levelsDir}`);
  }

  input.logger?.info(`Found ${files.length} level files`, { levelsDir: config.levelsDir });

  return runMigration(
    {
      files,
      steps,
      dryRun: input.dryRun,
      context: { strictAngles: config.strictAngles },
      logger: input.logger,
    },
    deps,
  );
}
