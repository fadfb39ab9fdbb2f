import * as fs from 'node:fs';
import { loadConfig } from '../../config/loader.js';
import type { ConfigOverrides } from '../../config/loader.js';
import { discoverLevelFiles } from '../../runner/discovery.js';
import { validateLevelText } from '../../validation/validate-level.js';

export interface ValidateLevelsInput {
  overrides?: ConfigOverrides;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export interface ValidateFileRow {
  file: string;
  valid: boolean;
  errors: string[];
}

export interface ValidateOutput {
  valid: boolean;
  files: ValidateFileRow[];
  total_files: number;
  invalid: number;
}

/**
 * Validate every level file under the configured levels directory.
 * An empty directory validates trivially.
 */
export function validateLevels(input: ValidateLevelsInput = {}): ValidateOutput {
  const config = loadConfig({ cwd: input.cwd, env: input.env, overrides: input.overrides });
  const files = discoverLevelFiles(config.levelsDir);

  const rows: ValidateFileRow[] = files.map((file) => {
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { file, valid: false, errors: [`Failed to read file: ${message}`] };
    }
    return { file, ...validateLevelText(text) };
  });

  const invalid = rows.filter((r) => !r.valid).length;
  return {
    valid: invalid === 0,
    files: rows,
    total_files: rows.length,
    invalid,
  };
}
