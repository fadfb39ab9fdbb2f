import { z } from 'zod';

export const pointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const sweeperSchema = z.object({
  start: pointSchema,
  end: pointSchema,
  sweepSeconds: z.number().positive(),
});

export const rotorSchema = z.object({
  center: pointSchema,
  speedDegreesPerSecond: z.number(),
  initialAngleDegrees: z.number(),
});

export const legacySegmentSchema = z.object({
  start: pointSchema,
  end: pointSchema,
});

/** Fields shared by every legacy laser, outside its nested `kind`. */
export const legacyLaserCommonSchema = z.object({
  id: z.string().min(1),
  color: z.string(),
  thickness: z.number(),
  enabled: z.boolean().optional(),
  kind: z.object({
    type: z.string().min(1),
  }),
});

export type LegacyLaserCommon = z.infer<typeof legacyLaserCommonSchema>;
