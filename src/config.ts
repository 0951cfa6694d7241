import { z } from 'zod';
import { LOG_LEVELS } from './utils/logger.js';
import { CONVERTER_IDS } from './types/index.js';

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  COORDS_DEFAULT_FORMAT: z.enum(CONVERTER_IDS).optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate environment settings. Empty strings count as unset so that a
 * blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    COORDS_DEFAULT_FORMAT: env.COORDS_DEFAULT_FORMAT || undefined,
  };
  return envSchema.parse(raw);
}
