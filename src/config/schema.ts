/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates what users write in `~/.config/tidecode/config.json` or
 * `.tidecode/config.json`. Nested sections use `.strict()` to catch
 * typos in their keys.
 */

import { z } from 'zod';
import { PERMISSION_MODES } from '../tools/types.js';
import { LOG_LEVELS } from '../integrations/utilities/logger.js';
import { MAX_TIMEOUT_SEC } from '../tools/bash.js';

/**
 * Connection settings for one provider profile.
 */
export const ProviderProfileSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
  })
  .strict();

const BashSchema = z
  .object({
    defaultTimeoutSec: z.number().positive().max(MAX_TIMEOUT_SEC).optional(),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
    file: z.string().min(1).optional(),
  })
  .strict();

/**
 * Zod schema for config.json files.
 */
export const UserConfigSchema = z
  .object({
    /** Active provider profile */
    provider: z.string().min(1).optional(),
    providers: z.record(z.string(), ProviderProfileSchema).optional(),
    maxIterations: z.number().int().positive().optional(),
    permission: z.enum(PERMISSION_MODES).optional(),
    bash: BashSchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type ProviderProfile = z.infer<typeof ProviderProfileSchema>;

/**
 * Validated user config type inferred from the schema.
 */
export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;
