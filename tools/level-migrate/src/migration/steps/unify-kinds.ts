import type { JsonObject } from '../../types/level.js';
import { decodeLegacyLaser } from '../../legacy/decoders.js';
import { encodeLaserRecord } from '../../model/laser-record.js';
import { getEntities } from '../document.js';
import type { MigrationStep } from '../types.js';

function hasLegacyKind(laser: JsonObject): boolean {
  return laser.kind !== undefined;
}

function needsMigration(document: JsonObject): boolean {
  return getEntities(document, 'lasers').some(hasLegacyKind);
}

/**
 * Replace sweeper, rotor and segment lasers (nested `kind`) with flat
 * ray and segment records.
 */
export const unifyKindsStep: MigrationStep = {
  name: 'unify-kinds',
  description: 'Convert legacy sweeper/rotor/segment lasers to ray and segment records',
  needsMigration,

  apply(document) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    next.lasers = getEntities(next, 'lasers').map((laser) =>
      hasLegacyKind(laser) ? encodeLaserRecord(decodeLegacyLaser(laser)) : laser,
    );

    return { document: next, changed: true, warnings: [] };
  },
};
