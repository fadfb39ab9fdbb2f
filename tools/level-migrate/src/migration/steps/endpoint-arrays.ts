import type { JsonObject } from '../../types/level.js';
import { CYCLE_BASIS_KEY } from '../../types/level.js';
import type { EntityCollection } from '../document.js';
import { describeEntity, getEntities, isJsonObject, replaceKeys } from '../document.js';
import { MalformedDocumentError } from '../errors.js';
import type { MigrationStep } from '../types.js';

function hasSingleEndpoint(entity: JsonObject): boolean {
  return entity.endpoint !== undefined;
}

function hasEndpointPair(entity: JsonObject): boolean {
  return entity.startEndpoint !== undefined || entity.endEndpoint !== undefined;
}

function needsMigration(document: JsonObject): boolean {
  return (
    document[CYCLE_BASIS_KEY] !== undefined ||
    getEntities(document, 'buttons').some(hasSingleEndpoint) ||
    getEntities(document, 'lasers').some((laser) => hasSingleEndpoint(laser) || hasEndpointPair(laser))
  );
}

function migrateEntity(collection: EntityCollection, entity: JsonObject, index: number): void {
  const label = describeEntity(collection, entity, index);
  const single = hasSingleEndpoint(entity);
  const pair = collection === 'lasers' && hasEndpointPair(entity);
  if (!single && !pair) return;

  if (entity.endpoints !== undefined) {
    throw new MalformedDocumentError(`${label} has both "endpoints" and a legacy endpoint field`);
  }
  if (single && pair) {
    throw new MalformedDocumentError(`${label} has both "endpoint" and "startEndpoint"/"endEndpoint"`);
  }

  if (single) {
    const endpoint = entity.endpoint;
    if (!isJsonObject(endpoint)) {
      throw new MalformedDocumentError(`${label}: "endpoint" must be an object`);
    }
    replaceKeys(entity, ['endpoint'], 'endpoints', [endpoint]);
    return;
  }

  const start = entity.startEndpoint;
  const end = entity.endEndpoint;
  if (!isJsonObject(start) || !isJsonObject(end)) {
    throw new MalformedDocumentError(
      `${label} needs both "startEndpoint" and "endEndpoint" objects`,
    );
  }
  replaceKeys(entity, ['startEndpoint', 'endEndpoint'], 'endpoints', [start, end]);
}

/**
 * Move every laser and button endpoint into an `endpoints` array:
 * `endpoint` becomes `[endpoint]`, a segment's start/end pair becomes
 * `[startEndpoint, endEndpoint]`. The cycle basis marker only guards
 * those pre-array fields, so it is dropped with them.
 */
export const endpointArraysStep: MigrationStep = {
  name: 'endpoint-arrays',
  description: 'Store laser and button endpoints in an "endpoints" array',
  needsMigration,

  apply(document) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    getEntities(next, 'buttons').forEach((button, index) => migrateEntity('buttons', button, index));
    getEntities(next, 'lasers').forEach((laser, index) => migrateEntity('lasers', laser, index));
    delete next[CYCLE_BASIS_KEY];

    return { document: next, changed: true, warnings: [] };
  },
};
