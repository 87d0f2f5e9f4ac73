/**
 * @fileoverview Runtime configuration for the swingta CLI
 *
 * Settings come from SWINGTA_* environment variables and are validated with
 * zod. Command-line flags override them per run.
 */

import { z } from 'zod';
import { ConfigurationError } from '@swingta/contracts';
import { LOG_LEVELS } from '@swingta/logger';
import type { Logger } from '@swingta/logger';

/**
 * CLI configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  zigzag: z
    .object({
      legs: z.number().int().positive().default(10),
      deviation: z.number().positive().default(5.0),
    })
    .default({}),

  output: z
    .object({
      format: z.enum(['json', 'csv']).default('json'),
      pretty: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable to config path mapping
 */
export const envMapping = {
  SWINGTA_LOG_LEVEL: ['logging', 'level'],
  SWINGTA_LOG_FORMAT: ['logging', 'format'],
  SWINGTA_LOG_FILE: ['logging', 'filePath'],
  SWINGTA_ZIGZAG_LEGS: ['zigzag', 'legs'],
  SWINGTA_ZIGZAG_DEVIATION: ['zigzag', 'deviation'],
  SWINGTA_OUTPUT_FORMAT: ['output', 'format'],
  SWINGTA_OUTPUT_PRETTY: ['output', 'pretty'],
} as const satisfies Record<string, readonly [keyof Config, string]>;

/**
 * Load configuration from environment and defaults
 *
 * @throws ConfigurationError listing every failing `path: message`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, Record<string, unknown>> = {};

  for (const [envKey, [section, key]] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      const target = rawConfig[section] ?? {};
      target[key] = parseEnvValue(value);
      rawConfig[section] = target;
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, {
      issues,
    });
  }

  logger?.debug('Configuration loaded', {
    level: result.data.logging.level,
    legs: result.data.zigzag.legs,
    deviation: result.data.zigzag.deviation,
    output: result.data.output.format,
  });

  return result.data;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}
