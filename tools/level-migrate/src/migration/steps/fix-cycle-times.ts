import type { JsonObject } from '../../types/level.js';
import { CYCLE_BASIS_KEY, ROUND_TRIP_BASIS } from '../../types/level.js';
import { describeEntity, getEntities, isJsonObject } from '../document.js';
import { MalformedDocumentError } from '../errors.js';
import type { MigrationStep } from '../types.js';

/**
 * Early converted files stored the one-way sweep time in the pre-array
 * endpoint fields. Lasers already on `endpoints` were written with round trips.
 */
const ONE_WAY_ENDPOINT_KEYS = ['endpoint', 'startEndpoint', 'endEndpoint'] as const;

function isFlatLaser(laser: JsonObject): boolean {
  return laser.type === 'ray' || laser.type === 'segment';
}

function movingPaths(laser: JsonObject): JsonObject[] {
  if (!isFlatLaser(laser)) return [];

  const paths: JsonObject[] = [];
  for (const key of ONE_WAY_ENDPOINT_KEYS) {
    const path = laser[key];
    if (isJsonObject(path) && path.cycleSeconds !== undefined && path.cycleSeconds !== null) {
      paths.push(path);
    }
  }
  return paths;
}

function needsMigration(document: JsonObject): boolean {
  if (document[CYCLE_BASIS_KEY] === ROUND_TRIP_BASIS) return false;
  return getEntities(document, 'lasers').some((laser) => movingPaths(laser).length > 0);
}

/**
 * Double one-way cycle times so every `cycleSeconds` is a full round trip,
 * then mark the document so the correction is never applied twice.
 */
export const fixCycleTimesStep: MigrationStep = {
  name: 'fix-cycle-times',
  description: 'Double one-way cycleSeconds on pre-array laser endpoints',
  needsMigration,

  apply(document) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    getEntities(next, 'lasers').forEach((laser, index) => {
      for (const path of movingPaths(laser)) {
        const cycleSeconds = path.cycleSeconds;
        if (typeof cycleSeconds !== 'number') {
          throw new MalformedDocumentError(
            `${describeEntity('lasers', laser, index)}: cycleSeconds must be a number`,
          );
        }
        path.cycleSeconds = cycleSeconds * 2;
      }
    });
    next[CYCLE_BASIS_KEY] = ROUND_TRIP_BASIS;

    return { document: next, changed: true, warnings: [] };
  },
};
