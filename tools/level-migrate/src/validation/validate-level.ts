import type { JsonObject } from '../types/level.js';
import { CYCLE_BASIS_KEY } from '../types/level.js';
import type { EntityCollection } from '../migration/document.js';
import {
  collectEndpointPaths,
  describeEntity,
  getEntities,
  parseLevelDocument,
} from '../migration/document.js';
import { MigrationError } from '../migration/errors.js';
import { levelSchema } from './level-schema.js';
import type { ValidatedLevel } from './level-schema.js';

export interface LevelValidationResult {
  valid: boolean;
  errors: string[];
}

/** Fields that only exist in pre-canonical layouts. */
const LEGACY_FIELDS: Record<EntityCollection, readonly string[]> = {
  lasers: ['kind', 'endpoint', 'startEndpoint', 'endEndpoint', 'initialAngle'],
  buttons: ['position', 'endpoint'],
};

function findLegacyFields(document: JsonObject): string[] {
  const errors: string[] = [];
  if (document[CYCLE_BASIS_KEY] !== undefined) {
    errors.push(`Level still has legacy field "${CYCLE_BASIS_KEY}"`);
  }
  for (const collection of ['lasers', 'buttons'] as const) {
    getEntities(document, collection).forEach((entity, index) => {
      const label = describeEntity(collection, entity, index);
      for (const field of LEGACY_FIELDS[collection]) {
        if (entity[field] !== undefined) {
          errors.push(`${label} still has legacy field "${field}"`);
        }
      }
      if (collectEndpointPaths(entity).some((path) => path.initialT !== undefined)) {
        errors.push(`${label} still has legacy field "initialT"`);
      }
    });
  }
  return errors;
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Semantic checks on a level that already matches the canonical schema.
 */
function checkLevel(level: ValidatedLevel): string[] {
  const errors: string[] = [];

  if (level.buttons.length === 0 && !level.id.includes('menu') && !level.id.includes('background')) {
    errors.push('Level has no buttons');
  }

  for (const id of findDuplicates(level.buttons.map((b) => b.id))) {
    errors.push(`Duplicate button ID "${id}"`);
  }
  for (const id of findDuplicates(level.lasers.map((l) => l.id))) {
    errors.push(`Duplicate laser ID "${id}"`);
  }

  for (const button of level.buttons) {
    if (button.endpoints.length === 0) {
      errors.push(`Button "${button.id}" has no endpoints`);
    }
    if (button.hitAreas.length === 0) {
      errors.push(`Button "${button.id}" has no hit areas`);
    }
  }

  for (const laser of level.lasers) {
    const expected = laser.type === 'ray' ? 1 : 2;
    if (laser.endpoints.length !== expected) {
      const noun = laser.type === 'ray' ? 'Ray' : 'Segment';
      errors.push(
        `${noun} laser "${laser.id}" must have exactly ${expected} endpoint${expected === 1 ? '' : 's'}, has ${laser.endpoints.length}`,
      );
    }
  }

  const laserIds = new Set(level.lasers.map((l) => l.id));
  for (const button of level.buttons) {
    for (const effect of button.effects ?? []) {
      for (const target of effect.action.lasers) {
        if (!laserIds.has(target)) {
          errors.push(`Button "${button.id}" has effect targeting non-existent laser "${target}"`);
        }
      }
    }
  }

  return errors;
}

/**
 * Validate a level against the canonical schema.
 */
export function validateLevelDocument(document: JsonObject): LevelValidationResult {
  let errors: string[];
  try {
    errors = findLegacyFields(document);
  } catch (err) {
    if (!(err instanceof MigrationError)) throw err;
    return { valid: false, errors: [err.message] };
  }

  const result = levelSchema.safeParse(document);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      errors.push(`${where}${issue.message}`);
    }
    return { valid: false, errors };
  }

  errors.push(...checkLevel(result.data));
  return { valid: errors.length === 0, errors };
}

/** Validate the text of a level file. */
export function validateLevelText(text: string): LevelValidationResult {
  let document: JsonObject;
  try {
    document = parseLevelDocument(text);
  } catch (err) {
    if (!(err instanceof MigrationError)) throw err;
    return { valid: false, errors: [err.message] };
  }
  return validateLevelDocument(document);
}
