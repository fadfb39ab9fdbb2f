import { z } from 'zod';
import type { JsonObject } from '../../types/level.js';
import { anglesEquivalent, buildEndpointPath, derivePathAngle } from '../../model/endpoint-path.js';
import { pointSchema } from '../../legacy/schemas.js';
import { collectEndpointPaths, describeEntity, getEntities } from '../document.js';
import { MalformedDocumentError, MotionChangeError } from '../errors.js';
import type { MigrationStep } from '../types.js';

const storedPathSchema = z.object({
  points: z.array(pointSchema).min(1),
  cycleSeconds: z.number().nullable().optional(),
});

function hasStoredAngle(laser: JsonObject): boolean {
  return laser.type === 'ray' && laser.initialAngle !== undefined;
}

function needsMigration(document: JsonObject): boolean {
  return getEntities(document, 'lasers').some(hasStoredAngle);
}

/** The angle the ray will take from its origin path once nothing is stored. */
function derivedAngle(laser: JsonObject, label: string): number {
  const origin = collectEndpointPaths(laser)[0];
  if (origin === undefined) {
    throw new MalformedDocumentError(`${label} has no endpoint path`);
  }
  const parsed = storedPathSchema.safeParse(origin);
  if (!parsed.success) {
    throw MalformedDocumentError.fromIssues(`${label} endpoint`, parsed.error.issues);
  }
  return derivePathAngle(buildEndpointPath(parsed.data.points, parsed.data.cycleSeconds ?? null));
}

/**
 * Delete the stored `initialAngle` from ray lasers. A stored angle that does
 * not match the path-derived one changes how the ray looks: it is reported as
 * a warning, or fails the file under `strictAngles`.
 */
export const removeAnglesStep: MigrationStep = {
  name: 'remove-angles',
  description: 'Remove stored initialAngle from ray lasers',
  needsMigration,

  apply(document, context) {
    if (!needsMigration(document)) {
      return { document, changed: false, warnings: [] };
    }

    const next = structuredClone(document);
    const warnings: string[] = [];

    getEntities(next, 'lasers').forEach((laser, index) => {
      if (!hasStoredAngle(laser)) return;

      const label = describeEntity('lasers', laser, index);
      const stored = laser.initialAngle;
      if (typeof stored !== 'number') {
        throw new MalformedDocumentError(`${label}: initialAngle must be a number`);
      }

      const derived = derivedAngle(laser, label);
      if (!anglesEquivalent(stored, derived)) {
        const message = `${label}: stored initialAngle ${stored} differs from path-derived angle ${derived}`;
        if (context.strictAngles) {
          throw new MotionChangeError(message, typeof laser.id === 'string' ? laser.id : label);
        }
        warnings.push(message);
      }

      delete laser.initialAngle;
    });

    return { document: next, changed: true, warnings };
  },
};
