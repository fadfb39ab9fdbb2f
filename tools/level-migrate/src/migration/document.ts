import type { JsonObject, JsonValue } from '../types/level.js';
import { MalformedDocumentError } from './errors.js';

export type EntityCollection = 'lasers' | 'buttons';

/** Keys under which a laser or button may carry endpoint paths. */
export const SINGLE_ENDPOINT_KEYS = ['endpoint', 'startEndpoint', 'endEndpoint'] as const;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse level file contents into a JSON object.
 *
 * @throws MalformedDocumentError if the text is not JSON or not an object.
 */
export function parseLevelDocument(text: string): JsonObject {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedDocumentError(`Invalid JSON: ${message}`);
  }
  if (!isJsonObject(parsed)) {
    throw new MalformedDocumentError('Level document must be a JSON object');
  }
  return parsed;
}

/** Encode a level with 2-space indentation and a trailing newline. */
export function encodeLevelDocument(document: JsonObject): string {
  return JSON.stringify(document, null, 2) + '\n';
}

/**
 * The lasers or buttons of a level. A missing collection is empty.
 *
 * @throws MalformedDocumentError if the collection is not an array of objects.
 */
export function getEntities(document: JsonObject, collection: EntityCollection): JsonObject[] {
  const value = document[collection];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new MalformedDocumentError(`"${collection}" must be an array`);
  }

  const entities: JsonObject[] = [];
  value.forEach((entity, index) => {
    if (!isJsonObject(entity)) {
      throw new MalformedDocumentError(`${collection}[${index}] must be an object`);
    }
    entities.push(entity);
  });
  return entities;
}

/** Human-readable label for an entity, used in errors and warnings. */
export function describeEntity(collection: EntityCollection, entity: JsonObject, index: number): string {
  const noun = collection === 'lasers' ? 'Laser' : 'Button';
  return typeof entity.id === 'string' ? `${noun} "${entity.id}"` : `${noun} #${index}`;
}

/**
 * Every endpoint path object an entity carries, in any of the historical
 * layouts (`endpoint`, `startEndpoint`/`endEndpoint`, `endpoints`).
 */
export function collectEndpointPaths(entity: JsonObject): JsonObject[] {
  const paths: JsonObject[] = [];
  for (const key of SINGLE_ENDPOINT_KEYS) {
    const value = entity[key];
    if (isJsonObject(value)) paths.push(value);
  }
  const list = entity.endpoints;
  if (Array.isArray(list)) {
    for (const value of list) {
      if (isJsonObject(value)) paths.push(value);
    }
  }
  return paths;
}

/**
 * Set an own enumerable key. Plain assignment would hit the `__proto__`
 * setter for a `"__proto__"` key that `JSON.parse` created as data.
 */
export function setEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Replace `oldKeys` with a single `newKey` holding `value`, in place.
 * The new key takes the position of the first old key present; the others
 * are dropped. Other keys keep their order.
 */
export function replaceKeys(
  target: JsonObject,
  oldKeys: readonly string[],
  newKey: string,
  value: JsonValue,
): void {
  const entries = Object.entries(target);
  for (const key of Object.keys(target)) {
    delete target[key];
  }

  let placed = false;
  for (const [key, existing] of entries) {
    if (oldKeys.includes(key)) {
      if (!placed) {
        setEntry(target, newKey, value);
        placed = true;
      }
      continue;
    }
    if (key === newKey) continue;
    setEntry(target, key, existing);
  }

  if (!placed) {
    setEntry(target, newKey, value);
  }
}
