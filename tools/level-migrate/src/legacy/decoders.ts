import type { ZodType, ZodTypeDef } from 'zod';
import type {
  JsonObject,
  LaserCommon,
  LaserRecord,
  LegacyKindPayloads,
  LegacyKindTag,
  LegacyRotor,
  LegacySegment,
  LegacySweeper,
  RayLaser,
  SegmentLaser,
} from '../types/level.js';
import { LEGACY_KIND_TAGS } from '../types/level.js';
import { buildEndpointPath, stationaryPath } from '../model/endpoint-path.js';
import { MalformedDocumentError, UnknownLegacyKindError } from '../migration/errors.js';
import { isJsonObject, setEntry } from '../migration/document.js';
import {
  legacyLaserCommonSchema,
  legacySegmentSchema,
  rotorSchema,
  sweeperSchema,
} from './schemas.js';

const DEGREES_TO_RADIANS = Math.PI / 180;

/** Fields consumed from a legacy laser; anything else is carried over. */
const LEGACY_LASER_KEYS = new Set(['id', 'color', 'thickness', 'enabled', 'cadence', 'kind']);

/**
 * A sweeper moves its ray's origin from `start` to `end` in `sweepSeconds` and
 * back, pointing perpendicular to its travel.
 */
export function decodeSweeper(sweeper: LegacySweeper, common: LaserCommon): RayLaser {
  const dx = sweeper.end.x - sweeper.start.x;
  const dy = sweeper.end.y - sweeper.start.y;

  return {
    ...common,
    type: 'ray',
    endpoints: [buildEndpointPath([sweeper.start, sweeper.end], sweeper.sweepSeconds * 2)],
    initialAngle: Math.atan2(dy, dx) + Math.PI / 2,
    rotationSpeed: 0,
  };
}

/** A rotor spins a ray about a fixed center. */
export function decodeRotor(rotor: LegacyRotor, common: LaserCommon): RayLaser {
  return {
    ...common,
    type: 'ray',
    endpoints: [stationaryPath(rotor.center)],
    initialAngle: rotor.initialAngleDegrees * DEGREES_TO_RADIANS,
    rotationSpeed: rotor.speedDegreesPerSecond * DEGREES_TO_RADIANS,
  };
}

export function decodeSegment(segment: LegacySegment, common: LaserCommon): SegmentLaser {
  return {
    ...common,
    type: 'segment',
    endpoints: [stationaryPath(segment.start), stationaryPath(segment.end)],
  };
}

interface LegacyDecoder<K extends LegacyKindTag> {
  schema: ZodType<LegacyKindPayloads[K], ZodTypeDef, unknown>;
  decode: (payload: LegacyKindPayloads[K], common: LaserCommon) => LaserRecord;
}

const LEGACY_DECODERS: { [K in LegacyKindTag]: LegacyDecoder<K> } = {
  sweeper: { schema: sweeperSchema, decode: decodeSweeper },
  rotor: { schema: rotorSchema, decode: decodeRotor },
  segment: { schema: legacySegmentSchema, decode: decodeSegment },
};

export function isLegacyKindTag(tag: string): tag is LegacyKindTag {
  const known: readonly string[] = LEGACY_KIND_TAGS;
  return known.includes(tag);
}

function decodeKind<K extends LegacyKindTag>(
  tag: K,
  payload: unknown,
  common: LaserCommon,
): LaserRecord {
  const decoder = LEGACY_DECODERS[tag];
  const result = decoder.schema.safeParse(payload);
  if (!result.success) {
    throw MalformedDocumentError.fromIssues(`Laser "${common.id}" ${tag}`, result.error.issues);
  }
  return decoder.decode(result.data, common);
}

/**
 * Decode a laser in the nested `kind` layout into a canonical record.
 *
 * @throws UnknownLegacyKindError when `kind.type` is not a known legacy kind.
 * @throws MalformedDocumentError when required fields are missing or mistyped.
 */
export function decodeLegacyLaser(raw: JsonObject): LaserRecord {
  const rawId = typeof raw.id === 'string' ? raw.id : null;
  const parsed = legacyLaserCommonSchema.safeParse(raw);
  if (!parsed.success) {
    throw MalformedDocumentError.fromIssues(
      rawId === null ? 'Laser' : `Laser "${rawId}"`,
      parsed.error.issues,
    );
  }

  const tag = parsed.data.kind.type;
  if (!isLegacyKindTag(tag)) {
    throw new UnknownLegacyKindError(tag, parsed.data.id);
  }

  const extras: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!LEGACY_LASER_KEYS.has(key)) {
      setEntry(extras, key, value);
    }
  }

  const cadence = raw.cadence;
  const common: LaserCommon = {
    id: parsed.data.id,
    color: parsed.data.color,
    thickness: parsed.data.thickness,
    enabled: parsed.data.enabled ?? true,
    ...(cadence !== undefined && cadence !== null ? { cadence } : {}),
    extras,
  };

  const kind = raw.kind;
  const payload = isJsonObject(kind) ? kind[tag] : undefined;
  return decodeKind(tag, payload, common);
}
