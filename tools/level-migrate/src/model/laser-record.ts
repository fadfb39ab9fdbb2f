import type { JsonObject, LaserRecord } from '../types/level.js';
import { encodeEndpointPath } from './endpoint-path.js';
import { setEntry } from '../migration/document.js';

/** Keys written by {@link encodeLaserRecord} ahead of pass-through fields. */
const RECORD_KEYS = new Set([
  'id',
  'color',
  'thickness',
  'enabled',
  'type',
  'endpoints',
  'initialAngle',
  'rotationSpeed',
  'cadence',
]);

/**
 * Encode a laser record as a flat JSON object.
 *
 * Key order: common fields, `type`, `endpoints`, ray-only fields, `cadence`,
 * then any extras the record carried over.
 */
export function encodeLaserRecord(record: LaserRecord): JsonObject {
  const encoded: JsonObject = {
    id: record.id,
    color: record.color,
    thickness: record.thickness,
    enabled: record.enabled,
    type: record.type,
    endpoints: record.endpoints.map(encodeEndpointPath),
  };

  if (record.type === 'ray') {
    if (record.initialAngle !== undefined) {
      encoded.initialAngle = record.initialAngle;
    }
    encoded.rotationSpeed = record.rotationSpeed;
  }

  if (record.cadence !== undefined && record.cadence !== null) {
    encoded.cadence = record.cadence;
  }

  for (const [key, value] of Object.entries(record.extras)) {
    if (!RECORD_KEYS.has(key)) {
      setEntry(encoded, key, value);
    }
  }

  return encoded;
}
