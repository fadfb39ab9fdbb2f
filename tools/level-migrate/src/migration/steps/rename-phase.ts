import type { JsonObject } from '../../types/level.js';
import type { EntityCollection } from '../document.js';
import { collectEndpointPaths, describeEntity, getEntities, replaceKeys } from '../document.js';
import { MalformedDocumentError } from '../errors.js';
import type { MigrationStep } from '../types.js';

const COLLECTIONS: EntityCollection[] = ['lasers', 'buttons'];

function needsRename(path: JsonObject): boolean {
  return path.initialT !== undefined || path.t === 0;
}

function needsMigration(document: JsonObject): boolean {
  return COLLECTIONS.some((collection) =>
    getEntities(document, collection).some((entity) =>
      collectEndpointPaths(entity).some(needsRename),
    ),
  );
}

function renamePhase(path: JsonObject, label: string): void {
  if (path.initialT === undefined) {
    if (path.t === 0) delete path.t;
    return;
  }

  const value = path.initialT;
  if (typeof value !== 'number') {
    throw new MalformedDocumentError(`${label}: initialT must be a number`);
  }

  if (value === 0) {
    delete path.initialT;
    if (path.t === 0) delete path.t;
  } else {
    replaceKeys(path, ['initialT'], 't', value);
  }
}

/**
 * Rename `initialT` to `t` on every endpoint path. A zero phase is dropped
 * instead of written.
 */
export const renamePhaseStep: MigrationStep = {
  name: 'rename-phase',
  description: 'Rename endpoint initialT to t, omitting zero phases',
  needsMigration,

  apply(document) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    for (const collection of COLLECTIONS) {
      getEntities(next, collection).forEach((entity, index) => {
        const label = describeEntity(collection, entity, index);
        for (const path of collectEndpointPaths(entity)) {
          renamePhase(path, label);
        }
      });
    }

    return { document: next, changed: true, warnings: [] };
  },
};
