import type { z } from 'zod';
import {
  EnvConfigSchema,
  ParserOptionsSchema,
  type EnvConfig,
  type ParserOptions,
} from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Validate a parser options object and fill in defaults.
 */
export function resolveParserOptions(input: unknown = {}): ParserOptions {
  const result = ParserOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_OPTIONS,
      `invalid parser options: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Read argwise settings from environment variables.
 * Unrelated variables are ignored.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse({
    ARGWISE_LOG_LEVEL: env.ARGWISE_LOG_LEVEL || undefined,
  });
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_ENV,
      `invalid environment: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Apply the environment config to the shared logger. An unset level leaves
 * the logger alone; an invalid one is reported as a warning and ignored.
 */
export function applyEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  let config: EnvConfig;
  try {
    config = loadEnvConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logger.warn(`ignoring ${error.message}`);
    return {};
  }
  if (config.ARGWISE_LOG_LEVEL !== undefined) {
    logger.setLevel(config.ARGWISE_LOG_LEVEL);
  }
  return config;
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
