import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { fileConfigSchema } from './schema.js';
import type { FileConfig, MigrateConfig } from './schema.js';

export const CONFIG_FILE_NAME = '.level-migrate.yaml';
export const DEFAULT_LEVELS_DIR = 'levels';

export const ENV_VARS = {
  levelsDir: 'LEVEL_MIGRATE_LEVELS_DIR',
  strictAngles: 'LEVEL_MIGRATE_STRICT_ANGLES',
} as const;

/**
 * Overrides given on the command line. Unset fields fall through.
 */
export interface ConfigOverrides {
  levelsDir?: string;
  strictAngles?: boolean;
}

export interface LoadConfigOptions {
  /** Directory searched for the config file; relative paths resolve from here. */
  cwd?: string;
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

function readFileConfig(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);
  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(
      `Invalid config at ${configPath}: ${result.error.issues.map((i) => i.message).join(', ')}`,
    );
  }
  return result.data;
}

function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  throw new Error(`Invalid ${name} value: "${value}"`);
}

/**
 * Resolve migration settings.
 *
 * Priority: CLI overrides > environment variables > config file > defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): MigrateConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const fileConfig = readFileConfig(path.join(cwd, CONFIG_FILE_NAME));

  const envLevelsDir = env[ENV_VARS.levelsDir];
  const levelsDir =
    overrides.levelsDir ??
    (envLevelsDir !== undefined && envLevelsDir !== '' ? envLevelsDir : undefined) ??
    fileConfig.levels_dir ??
    DEFAULT_LEVELS_DIR;

  const strictAngles =
    overrides.strictAngles ??
    parseBooleanEnv(ENV_VARS.strictAngles, env[ENV_VARS.strictAngles]) ??
    fileConfig.strict_angles ??
    false;

  return {
    levelsDir: path.resolve(cwd, levelsDir),
    strictAngles,
  };
}
