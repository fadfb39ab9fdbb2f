import type { EndpointPath, JsonObject, Point } from '../types/level.js';

/** Tolerance used when comparing angles in radians. */
export const ANGLE_EPSILON = 1e-6;

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Drop consecutive duplicate points. */
function collapseDuplicates(points: Point[]): Point[] {
  const result: Point[] = [];
  for (const point of points) {
    const last = result[result.length - 1];
    if (last === undefined || !samePoint(last, point)) {
      result.push({ x: point.x, y: point.y });
    }
  }
  return result;
}

/** A path that stays at `point` for the whole level. */
export function stationaryPath(point: Point): EndpointPath {
  return { points: [{ x: point.x, y: point.y }], cycleSeconds: null, t: 0 };
}

/**
 * Build a canonical endpoint path.
 *
 * A missing or non-positive cycle, or fewer than two distinct points, yields a
 * stationary path at the first point.
 *
 * @throws If `points` is empty.
 */
export function buildEndpointPath(
  points: Point[],
  cycleSeconds: number | null = null,
  t = 0,
): EndpointPath {
  const first = points[0];
  if (first === undefined) {
    throw new Error('Endpoint path needs at least one point');
  }

  if (cycleSeconds === null || !(cycleSeconds > 0)) {
    return stationaryPath(first);
  }

  const collapsed = collapseDuplicates(points);
  if (collapsed.length < 2) {
    return stationaryPath(first);
  }

  return { points: collapsed, cycleSeconds, t };
}

export function isStationary(path: EndpointPath): boolean {
  return path.cycleSeconds === null;
}

/**
 * Encode a path for disk: `cycleSeconds` only when moving, `t` only when
 * non-zero.
 */
export function encodeEndpointPath(path: EndpointPath): JsonObject {
  const encoded: JsonObject = {
    points: path.points.map((p) => ({ x: p.x, y: p.y })),
  };
  if (path.cycleSeconds !== null) {
    encoded.cycleSeconds = path.cycleSeconds;
  }
  if (path.t !== 0) {
    encoded.t = path.t;
  }
  return encoded;
}

/**
 * Angle a ray takes from its path once no angle is stored: perpendicular to
 * the first leg of a moving path, 0 for a stationary one.
 */
export function derivePathAngle(path: EndpointPath): number {
  if (isStationary(path)) return 0;

  const [from, to] = path.points;
  if (from === undefined || to === undefined) return 0;

  return Math.atan2(to.y - from.y, to.x - from.x) + Math.PI / 2;
}

/** Whether two angles point the same way, modulo a full turn. */
export function anglesEquivalent(a: number, b: number): boolean {
  const fullTurn = 2 * Math.PI;
  const diff = (((a - b) % fullTurn) + fullTurn) % fullTurn;
  return diff < ANGLE_EPSILON || fullTurn - diff < ANGLE_EPSILON;
}
