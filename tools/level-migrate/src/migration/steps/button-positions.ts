import type { JsonObject } from '../../types/level.js';
import { pointSchema } from '../../legacy/schemas.js';
import { encodeEndpointPath, stationaryPath } from '../../model/endpoint-path.js';
import { describeEntity, getEntities, replaceKeys } from '../document.js';
import { MalformedDocumentError } from '../errors.js';
import type { MigrationStep } from '../types.js';

function hasBarePosition(button: JsonObject): boolean {
  return (
    button.position !== undefined &&
    button.endpoint === undefined &&
    button.endpoints === undefined
  );
}

function needsMigration(document: JsonObject): boolean {
  return getEntities(document, 'buttons').some(hasBarePosition);
}

/**
 * Turn a button's fixed `position` into a stationary endpoint path.
 */
export const buttonPositionsStep: MigrationStep = {
  name: 'button-positions',
  description: 'Replace button positions with stationary endpoint paths',
  needsMigration,

  apply(document) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    getEntities(next, 'buttons').forEach((button, index) => {
      if (!hasBarePosition(button)) return;

      const parsed = pointSchema.safeParse(button.position);
      if (!parsed.success) {
        throw MalformedDocumentError.fromIssues(
          `${describeEntity('buttons', button, index)} position`,
          parsed.error.issues,
        );
      }
      replaceKeys(button, ['position'], 'endpoints', [
        encodeEndpointPath(stationaryPath(parsed.data)),
      ]);
    });

    return { document: next, changed: true, warnings: [] };
  },
};
