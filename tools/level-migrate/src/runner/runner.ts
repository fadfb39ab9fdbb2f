import * as fs from 'node:fs';
import { applySteps } from '../migration/pipeline.js';
import { encodeLevelDocument, parseLevelDocument } from '../migration/document.js';
import { FileAccessError, MigrationError } from '../migration/errors.js';
import type { MigrationErrorKind } from '../migration/errors.js';
import type { MigrationStep, StepContext, StepName } from '../migration/types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export type FileStatus = 'migrated' | 'skipped' | 'failed';

export interface FileResult {
  file: string;
  status: FileStatus;
  /** Steps that changed the file. */
  steps: StepName[];
  warnings: string[];
  error?: {
    kind: MigrationErrorKind;
    message: string;
  };
}

/**
 * Batch result, serialized as JSON output.
 */
export interface MigrationReport {
  dry_run: boolean;
  steps: StepName[];
  files: FileResult[];
  total_files: number;
  migrated: number;
  skipped: number;
  failed: number;
}

/**
 * Injectable file access for runMigration.
 * Defaults to real implementations; tests can override.
 */
export interface RunnerDeps {
  readFile: (filePath: string) => string;
  writeFile: (filePath: string, data: string) => void;
}

/** Write to a temporary sibling, then rename it over the target. */
function writeFileAtomic(filePath: string, data: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmpPath, data, 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

const defaultDeps: RunnerDeps = {
  readFile: (filePath: string) => fs.readFileSync(filePath, 'utf-8'),
  writeFile: writeFileAtomic,
};

export interface RunMigrationInput {
  files: readonly string[];
  steps: readonly MigrationStep[];
  dryRun: boolean;
  context: StepContext;
  logger?: Logger;
}

function migrateFile(
  file: string,
  input: RunMigrationInput,
  deps: RunnerDeps,
): FileResult {
  let original: string;
  try {
    original = deps.readFile(file);
  } catch (err) {
    throw new FileAccessError(file, err);
  }

  const document = parseLevelDocument(original);
  const outcome = applySteps(document, input.steps, input.context);
  const encoded = encodeLevelDocument(outcome.document);

  if (outcome.appliedSteps.length === 0 || encoded === original) {
    return { file, status: 'skipped', steps: [], warnings: outcome.warnings };
  }

  if (!input.dryRun) {
    try {
      deps.writeFile(file, encoded);
    } catch (err) {
      throw new FileAccessError(file, err);
    }
  }

  return { file, status: 'migrated', steps: outcome.appliedSteps, warnings: outcome.warnings };
}

/**
 * Run steps over each file in turn.
 *
 * A file that fails is recorded and left untouched; the batch carries on.
 * Unchanged files are never rewritten.
 */
export function runMigration(
  input: RunMigrationInput,
  deps: Partial<RunnerDeps> = {},
): MigrationReport {
  const resolvedDeps: RunnerDeps = { ...defaultDeps, ...deps };
  const logger = input.logger ?? silentLogger;
  const results: FileResult[] = [];

  for (const file of input.files) {
    let result: FileResult;
    try {
      result = migrateFile(file, input, resolvedDeps);
    } catch (err) {
      if (!(err instanceof MigrationError)) throw err;
      result = {
        file,
        status: 'failed',
        steps: [],
        warnings: [],
        error: { kind: err.kind, message: err.message },
      };
    }

    for (const warning of result.warnings) {
      logger.warn(warning, { file });
    }
    if (result.status === 'migrated') {
      logger.info(input.dryRun ? 'Would migrate' : 'Migrated', { file, steps: result.steps });
    } else if (result.status === 'skipped') {
      logger.debug('Already migrated, skipping', { file });
    } else {
      logger.error('Migration failed', { file, ...result.error });
    }

    results.push(result);
  }

  const report: MigrationReport = {
    dry_run: input.dryRun,
    steps: input.steps.map((step) => step.name),
    files: results,
    total_files: results.length,
    migrated: results.filter((r) => r.status === 'migrated').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'failed').length,
  };

  logger.info('Migration complete', {
    migrated: report.migrated,
    skipped: report.skipped,
    failed: report.failed,
  });

  return report;
}

/** 0 when every file succeeded or was skipped, 1 when any failed. */
export function exitCodeFor(report: MigrationReport): number {
  return report.failed > 0 ? 1 : 0;
}
