import { describe, it, expect } from 'vitest';
import {
  decodeLegacyLaser,
  decodeRotor,
  decodeSegment,
  decodeSweeper,
  isLegacyKindTag,
} from '../../src/legacy/decoders.js';
import { encodeLaserRecord } from '../../src/model/laser-record.js';
import { MalformedDocumentError, UnknownLegacyKindError } from '../../src/migration/errors.js';
import type { JsonObject, LaserCommon } from '../../src/types/level.js';

const common: LaserCommon = {
  id: 'l1',
  color: 'red',
  thickness: 0.01,
  enabled: true,
  extras: {},
};

function legacyLaser(kind: JsonObject, extra: JsonObject = {}): JsonObject {
  return { id: 'l1', color: 'red', thickness: 0.01, kind, ...extra };
}

describe('decodeSweeper', () => {
  it('moves between start and end with a round-trip cycle of twice the sweep time', () => {
    const ray = decodeSweeper(
      { start: { x: 0, y: 0 }, end: { x: 10, y: 0 }, sweepSeconds: 3 },
      common,
    );

    expect(ray.type).toBe('ray');
    expect(ray.endpoints).toEqual([
      { points: [{ x: 0, y: 0 }, { x: 10, y: 0 }], cycleSeconds: 6, t: 0 },
    ]);
    expect(ray.initialAngle).toBeCloseTo(Math.PI / 2);
    expect(ray.rotationSpeed).toBe(0);
  });

  it('points perpendicular to a diagonal sweep', () => {
    const ray = decodeSweeper(
      { start: { x: 0, y: 0 }, end: { x: 1, y: 1 }, sweepSeconds: 2 },
      common,
    );
    expect(ray.initialAngle).toBeCloseTo((3 * Math.PI) / 4);
  });
});

describe('decodeRotor', () => {
  it('stays at its center and converts degrees to radians', () => {
    const ray = decodeRotor(
      { center: { x: 5, y: 5 }, speedDegreesPerSecond: 90, initialAngleDegrees: 180 },
      common,
    );

    expect(ray.endpoints).toEqual([{ points: [{ x: 5, y: 5 }], cycleSeconds: null, t: 0 }]);
    expect(ray.initialAngle).toBeCloseTo(Math.PI);
    expect(ray.rotationSpeed).toBeCloseTo(Math.PI / 2);
  });

  it('keeps the sign of a counter-rotating speed', () => {
    const ray = decodeRotor(
      { center: { x: 0, y: 0 }, speedDegreesPerSecond: -45, initialAngleDegrees: 0 },
      common,
    );
    expect(ray.rotationSpeed).toBeCloseTo(-Math.PI / 4);
    expect(ray.initialAngle).toBe(0);
  });
});

describe('decodeSegment', () => {
  it('produces two stationary endpoints and no angle fields', () => {
    const segment = decodeSegment({ start: { x: 0.1, y: 0.2 }, end: { x: 0.8, y: 0.9 } }, common);

    expect(segment.type).toBe('segment');
    expect(segment.endpoints).toEqual([
      { points: [{ x: 0.1, y: 0.2 }], cycleSeconds: null, t: 0 },
      { points: [{ x: 0.8, y: 0.9 }], cycleSeconds: null, t: 0 },
    ]);
    expect('initialAngle' in segment).toBe(false);
    expect('rotationSpeed' in segment).toBe(false);
  });
});

describe('decodeLegacyLaser', () => {
  it('decodes a sweeper laser into a ray record', () => {
    const record = decodeLegacyLaser(
      legacyLaser({
        type: 'sweeper',
        sweeper: { start: { x: 0, y: 0 }, end: { x: 10, y: 0 }, sweepSeconds: 3 },
      }),
    );

    const encoded = encodeLaserRecord(record);
    expect(encoded.type).toBe('ray');
    expect(encoded.endpoints).toEqual([
      { points: [{ x: 0, y: 0 }, { x: 10, y: 0 }], cycleSeconds: 6 },
    ]);
    expect(encoded.enabled).toBe(true);
  });

  it('decodes a segment laser into a segment record', () => {
    const record = decodeLegacyLaser(
      legacyLaser({
        type: 'segment',
        segment: { start: { x: 0, y: 0 }, end: { x: 1, y: 0 } },
      }),
    );

    expect(encodeLaserRecord(record)).toEqual({
      id: 'l1',
      color: 'red',
      thickness: 0.01,
      enabled: true,
      type: 'segment',
      endpoints: [{ points: [{ x: 0, y: 0 }] }, { points: [{ x: 1, y: 0 }] }],
    });
  });

  it('keeps enabled, cadence and unknown fields', () => {
    const record = decodeLegacyLaser(
      legacyLaser(
        {
          type: 'rotor',
          rotor: { center: { x: 5, y: 5 }, speedDegreesPerSecond: 0, initialAngleDegrees: 0 },
        },
        { enabled: false, cadence: [{ onSeconds: 1, offSeconds: 1 }], label: 'spinner' },
      ),
    );

    const encoded = encodeLaserRecord(record);
    expect(encoded.enabled).toBe(false);
    expect(encoded.cadence).toEqual([{ onSeconds: 1, offSeconds: 1 }]);
    expect(encoded.label).toBe('spinner');
    expect(encoded.kind).toBeUndefined();
  });

  it('drops a null cadence', () => {
    const record = decodeLegacyLaser(
      legacyLaser(
        { type: 'segment', segment: { start: { x: 0, y: 0 }, end: { x: 1, y: 0 } } },
        { cadence: null },
      ),
    );
    expect('cadence' in encodeLaserRecord(record)).toBe(false);
  });

  it('fails on an unknown kind tag, naming it', () => {
    const laser = legacyLaser({ type: 'beam', beam: {} });
    expect(() => decodeLegacyLaser(laser)).toThrow(UnknownLegacyKindError);
    expect(() => decodeLegacyLaser(laser)).toThrow('Unknown laser kind "beam" on laser "l1"');
  });

  it('fails when the kind payload is missing a field', () => {
    const laser = legacyLaser({
      type: 'sweeper',
      sweeper: { start: { x: 0, y: 0 }, end: { x: 10, y: 0 } },
    });
    expect(() => decodeLegacyLaser(laser)).toThrow(MalformedDocumentError);
    expect(() => decodeLegacyLaser(laser)).toThrow('Laser "l1" sweeper: sweepSeconds: Required');
  });

  it('fails a sweeper whose sweep time is not positive', () => {
    for (const sweepSeconds of [0, -2]) {
      const laser = legacyLaser({
        type: 'sweeper',
        sweeper: { start: { x: 0, y: 0 }, end: { x: 1, y: 0 }, sweepSeconds },
      });
      expect(() => decodeLegacyLaser(laser)).toThrow(MalformedDocumentError);
      expect(() => decodeLegacyLaser(laser)).toThrow(
        'Laser "l1" sweeper: sweepSeconds: Number must be greater than 0',
      );
    }
  });

  it('carries over a "__proto__" field as data', () => {
    const laser: JsonObject = JSON.parse(
      '{"id":"l1","color":"red","thickness":0.01,"__proto__":{"tag":1},' +
        '"kind":{"type":"segment","segment":{"start":{"x":0,"y":0},"end":{"x":1,"y":0}}}}',
    );

    const encoded = encodeLaserRecord(decodeLegacyLaser(laser));

    expect(Object.keys(encoded)).toEqual([
      'id',
      'color',
      'thickness',
      'enabled',
      'type',
      'endpoints',
      '__proto__',
    ]);
    expect(Object.getOwnPropertyDescriptor(encoded, '__proto__')?.value).toEqual({ tag: 1 });
  });

  it('fails when the kind payload is absent', () => {
    expect(() => decodeLegacyLaser(legacyLaser({ type: 'rotor' }))).toThrow(MalformedDocumentError);
  });

  it('fails when a common field is missing', () => {
    const laser: JsonObject = {
      id: 'l9',
      thickness: 0.01,
      kind: { type: 'segment', segment: { start: { x: 0, y: 0 }, end: { x: 1, y: 0 } } },
    };
    expect(() => decodeLegacyLaser(laser)).toThrow('Laser "l9": color: Required');
  });
});

describe('isLegacyKindTag', () => {
  it('accepts only the three legacy kinds', () => {
    expect(isLegacyKindTag('sweeper')).toBe(true);
    expect(isLegacyKindTag('rotor')).toBe(true);
    expect(isLegacyKindTag('segment')).toBe(true);
    expect(isLegacyKindTag('ray')).toBe(false);
  });
});
