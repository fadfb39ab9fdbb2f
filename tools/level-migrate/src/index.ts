// Types
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  Point,
  EndpointPath,
  LaserType,
  LaserCommon,
  RayLaser,
  SegmentLaser,
  LaserRecord,
  LegacyKindTag,
  LegacySweeper,
  LegacyRotor,
  LegacySegment,
} from './types/level.js';
export { LASER_TYPES, LEGACY_KIND_TAGS, CYCLE_BASIS_KEY, ROUND_TRIP_BASIS } from './types/level.js';

// Model
export {
  buildEndpointPath,
  stationaryPath,
  isStationary,
  encodeEndpointPath,
  derivePathAngle,
  anglesEquivalent,
} from './model/endpoint-path.js';
export { encodeLaserRecord } from './model/laser-record.js';

// Legacy decoders
export {
  decodeSweeper,
  decodeRotor,
  decodeSegment,
  decodeLegacyLaser,
  isLegacyKindTag,
} from './legacy/decoders.js';

// Migration
export {
  MigrationError,
  UnknownLegacyKindError,
  MalformedDocumentError,
  MotionChangeError,
  FileAccessError,
} from './migration/errors.js';
export type { MigrationErrorKind } from './migration/errors.js';
export { parseLevelDocument, encodeLevelDocument } from './migration/document.js';
export { STEP_NAMES } from './migration/types.js';
export type {
  StepName,
  StepContext,
  StepOutcome,
  MigrationStep,
  PipelineOutcome,
} from './migration/types.js';
export {
  MIGRATION_STEPS,
  getStep,
  resolveSteps,
  isStepName,
  unifyKindsStep,
  fixCycleTimesStep,
  buttonPositionsStep,
  endpointArraysStep,
  removeAnglesStep,
  renamePhaseStep,
} from './migration/steps/index.js';
export { applySteps, DEFAULT_STEP_CONTEXT } from './migration/pipeline.js';

// Runner
export { discoverLevelFiles } from './runner/discovery.js';
export { runMigration, exitCodeFor } from './runner/runner.js';
export type {
  FileStatus,
  FileResult,
  MigrationReport,
  RunnerDeps,
  RunMigrationInput,
} from './runner/runner.js';

// Validation
export { levelSchema, endpointPathSchema } from './validation/level-schema.js';
export { validateLevelDocument, validateLevelText } from './validation/validate-level.js';
export type { LevelValidationResult } from './validation/validate-level.js';

// Config
export { loadConfig, CONFIG_FILE_NAME, DEFAULT_LEVELS_DIR, ENV_VARS } from './config/loader.js';
export type { LoadConfigOptions, ConfigOverrides } from './config/loader.js';
export type { MigrateConfig } from './config/schema.js';

// Logging
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerDeps } from './logger.js';
