import { z } from 'zod';
import { pointSchema } from '../legacy/schemas.js';

export const endpointPathSchema = z
  .object({
    points: z.array(pointSchema).min(1),
    cycleSeconds: z.number().positive().nullable().optional(),
    t: z.number().optional(),
  })
  .superRefine((path, ctx) => {
    const moving = path.cycleSeconds !== undefined && path.cycleSeconds !== null;
    if (moving && path.points.length < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'A moving endpoint path needs at least 2 points',
        path: ['points'],
      });
    }
    if (!moving && path.points.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'A stationary endpoint path must have exactly 1 point',
        path: ['points'],
      });
    }
  });

const effectSchema = z
  .object({
    action: z
      .object({
        lasers: z.array(z.string()),
      })
      .passthrough(),
  })
  .passthrough();

export const buttonSchema = z
  .object({
    id: z.string().min(1),
    endpoints: z.array(endpointPathSchema),
    hitAreas: z.array(z.unknown()),
    effects: z.array(effectSchema).optional(),
  })
  .passthrough();

const laserCommonSchema = z.object({
  id: z.string().min(1),
  color: z.string(),
  thickness: z.number(),
  enabled: z.boolean().optional(),
});

export const rayLaserSchema = laserCommonSchema
  .extend({
    type: z.literal('ray'),
    endpoints: z.array(endpointPathSchema),
    rotationSpeed: z.number(),
  })
  .passthrough();

export const segmentLaserSchema = laserCommonSchema
  .extend({
    type: z.literal('segment'),
    endpoints: z.array(endpointPathSchema),
  })
  .passthrough();

export const laserSchema = z.discriminatedUnion('type', [rayLaserSchema, segmentLaserSchema]);

export const levelSchema = z
  .object({
    id: z.string().min(1),
    buttons: z.array(buttonSchema),
    lasers: z.array(laserSchema),
  })
  .passthrough();

export type ValidatedLevel = z.infer<typeof levelSchema>;
