/**
 * Types for level documents and the canonical laser records they carry.
 *
 * Level files are migrated as plain JSON: only the endpoint-bearing shape of
 * lasers and buttons is interpreted, everything else passes through.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Normalized scene coordinate. */
export interface Point {
  x: number;
  y: number;
}

/**
 * Where a point is at time `t`.
 *
 * A path is stationary when `cycleSeconds` is null; it then has exactly one
 * point. A moving path has at least two points and walks them back and forth,
 * one full round trip every `cycleSeconds`.
 */
export interface EndpointPath {
  points: Point[];
  cycleSeconds: number | null;
  /** Phase offset in seconds. 0 is never written to disk. */
  t: number;
}

export const LASER_TYPES = ['ray', 'segment'] as const;
export type LaserType = (typeof LASER_TYPES)[number];

/** Fields every laser carries regardless of variant. */
export interface LaserCommon {
  id: string;
  color: string;
  thickness: number;
  enabled: boolean;
  /** On/off timing, opaque to the migration. */
  cadence?: JsonValue;
  /** Unrecognized fields carried over from the source record. */
  extras: JsonObject;
}

export interface RayLaser extends LaserCommon {
  type: 'ray';
  endpoints: [EndpointPath];
  /** Radians. Only present on records decoded from legacy kinds. */
  initialAngle?: number;
  /** Radians per second, signed. */
  rotationSpeed: number;
}

export interface SegmentLaser extends LaserCommon {
  type: 'segment';
  endpoints: [EndpointPath, EndpointPath];
}

export type LaserRecord = RayLaser | SegmentLaser;

export const LEGACY_KIND_TAGS = ['sweeper', 'rotor', 'segment'] as const;
export type LegacyKindTag = (typeof LEGACY_KIND_TAGS)[number];

export interface LegacySweeper {
  start: Point;
  end: Point;
  /** One-way travel time from start to end. */
  sweepSeconds: number;
}

export interface LegacyRotor {
  center: Point;
  speedDegreesPerSecond: number;
  initialAngleDegrees: number;
}

export interface LegacySegment {
  start: Point;
  end: Point;
}

/** Payload type for each legacy kind tag. */
export interface LegacyKindPayloads {
  sweeper: LegacySweeper;
  rotor: LegacyRotor;
  segment: LegacySegment;
}

/** Marker written once cycle times are known to be full round trips. */
export const CYCLE_BASIS_KEY = 'cycleBasis';
export const ROUND_TRIP_BASIS = 'roundTrip';
