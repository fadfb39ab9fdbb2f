import { z } from 'zod';

export const fileConfigSchema = z
  .object({
    levels_dir: z.string().min(1).optional(),
    strict_angles: z.boolean().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Resolved settings after merging flags, environment, config file and defaults.
 */
export interface MigrateConfig {
  /** Absolute path of the directory holding level files. */
  levelsDir: string;
  strictAngles: boolean;
}
