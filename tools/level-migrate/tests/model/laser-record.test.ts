import { describe, it, expect } from 'vitest';
import { encodeLaserRecord } from '../../src/model/laser-record.js';
import { buildEndpointPath, stationaryPath } from '../../src/model/endpoint-path.js';
import type { RayLaser, SegmentLaser } from '../../src/types/level.js';

describe('encodeLaserRecord', () => {
  it('encodes a ray with its fields in canonical order', () => {
    const ray: RayLaser = {
      id: 'ray-1',
      color: '#ff0000',
      thickness: 0.02,
      enabled: true,
      type: 'ray',
      endpoints: [buildEndpointPath([{ x: 0, y: 0 }, { x: 1, y: 0 }], 4)],
      initialAngle: 1.5,
      rotationSpeed: 0,
      cadence: [{ onSeconds: 1, offSeconds: 2 }],
      extras: { label: 'left' },
    };

    const encoded = encodeLaserRecord(ray);

    expect(Object.keys(encoded)).toEqual([
      'id',
      'color',
      'thickness',
      'enabled',
      'type',
      'endpoints',
      'initialAngle',
      'rotationSpeed',
      'cadence',
      'label',
    ]);
    expect(encoded.endpoints).toEqual([
      { points: [{ x: 0, y: 0 }, { x: 1, y: 0 }], cycleSeconds: 4 },
    ]);
    expect(encoded.cadence).toEqual([{ onSeconds: 1, offSeconds: 2 }]);
  });

  it('omits initialAngle when the record has none', () => {
    const ray: RayLaser = {
      id: 'ray-2',
      color: 'blue',
      thickness: 0.01,
      enabled: false,
      type: 'ray',
      endpoints: [stationaryPath({ x: 0.5, y: 0.5 })],
      rotationSpeed: 1,
      extras: {},
    };

    expect(encodeLaserRecord(ray)).toEqual({
      id: 'ray-2',
      color: 'blue',
      thickness: 0.01,
      enabled: false,
      type: 'ray',
      endpoints: [{ points: [{ x: 0.5, y: 0.5 }] }],
      rotationSpeed: 1,
    });
  });

  it('encodes a segment without angle or rotation fields', () => {
    const segment: SegmentLaser = {
      id: 'seg-1',
      color: 'green',
      thickness: 0.03,
      enabled: true,
      type: 'segment',
      endpoints: [stationaryPath({ x: 0, y: 0 }), stationaryPath({ x: 1, y: 1 })],
      extras: {},
    };

    expect(encodeLaserRecord(segment)).toEqual({
      id: 'seg-1',
      color: 'green',
      thickness: 0.03,
      enabled: true,
      type: 'segment',
      endpoints: [{ points: [{ x: 0, y: 0 }] }, { points: [{ x: 1, y: 1 }] }],
    });
  });

  it('does not let extras overwrite record fields', () => {
    const segment: SegmentLaser = {
      id: 'seg-2',
      color: 'green',
      thickness: 0.03,
      enabled: true,
      type: 'segment',
      endpoints: [stationaryPath({ x: 0, y: 0 }), stationaryPath({ x: 1, y: 1 })],
      extras: { type: 'ray', note: 'kept' },
    };

    const encoded = encodeLaserRecord(segment);
    expect(encoded.type).toBe('segment');
    expect(encoded.note).toBe('kept');
  });
});
