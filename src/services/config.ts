/**
 * Runtime Configuration
 *
 * Environment is loaded once (dotenv) and validated with zod so that a
 * misconfigured device fails at startup instead of on the first tool call.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// =============================================================================
// SCHEMA
// =============================================================================

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: z.string().min(1).default('./logs'),

  // Reported as serverInfo in the MCP initialize reply
  BOARD_NAME: z.string().min(1).default('host-sim'),
  FIRMWARE_VERSION: z.string().min(1).default('1.0.0'),

  DATABASE_PATH: z.string().min(1).default('./data/device.db'),
  FIRMWARE_STAGING_PATH: z.string().min(1).default('./data/firmware.bin'),

  // JPEG used as the simulated camera frame; no camera tool without it
  CAMERA_IMAGE_PATH: z.string().min(1).optional(),

  // When unset the MCP socket accepts any orchestrator
  MCP_AUTH_SECRET: z.string().min(16).optional(),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a config from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
