import { z } from 'zod';

export const UntrackedFilesModeSchema = z.enum(['all', 'normal', 'no']);

/**
 * Shape of `.gitmarks.json`; every key is optional and merged over the defaults
 */
export const GitmarksSettingsSchema = z
  .object({
    untrackedFiles: UntrackedFilesModeSchema,
    gitBinary: z.string().min(1, 'Git binary cannot be empty'),
    timeoutMs: z.number().int().positive(),
    hideIgnored: z.boolean(),
  })
  .partial()
  .strict();
