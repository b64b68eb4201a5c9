import bytes from 'bytes';
import { z } from 'zod';
import { AppError } from './errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Settings for a RestApiHandler
 */
export interface HandlerConfig {
  /** Prefix every endpoint is mounted under, e.g. `/api`. Empty mounts at the root. */
  basePath: string;
  /** Body size limit handed to the JSON and urlencoded parsers. */
  bodyLimit: string;
  /** Origins allowed by CORS. Empty disables CORS handling. */
  corsOrigins: string[];
  logLevel: LogLevel;
}

const basePathSchema = z
  .string()
  .trim()
  .refine((value) => value === '' || value.startsWith('/'), 'Base path must start with "/"')
  .transform((value) => value.replace(/\/+$/, ''));

const bodyLimitSchema = z
  .string()
  .trim()
  .min(1, 'Body limit cannot be empty')
  .refine((value) => bytes.parse(value) !== null, 'Body limit must be a byte size such as "100kb"');

const logLevelSchema = z.enum(LOG_LEVELS);

const originListSchema = z
  .array(z.string().trim())
  .transform((origins) => Array.from(new Set(origins.filter((origin) => origin.length > 0))));

const envSchema = z.object({
  BRIDGE_BASE_PATH: basePathSchema.default(''),
  BRIDGE_JSON_LIMIT: bodyLimitSchema.default('100kb'),
  BRIDGE_CORS_ORIGINS: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(',') : []))
    .pipe(originListSchema),
  LOG_LEVEL: logLevelSchema.default('info'),
});

const overridesSchema = z.object({
  basePath: basePathSchema.optional(),
  bodyLimit: bodyLimitSchema.optional(),
  corsOrigins: originListSchema.optional(),
  logLevel: logLevelSchema.optional(),
});

function invalidConfig(error: z.ZodError): AppError {
  const problems = error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return new AppError('INVALID_CONFIG', `Invalid configuration: ${problems.join('; ')}`, {
    problems,
  });
}

/**
 * Read handler configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HandlerConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw invalidConfig(result.error);
  }

  return {
    basePath: result.data.BRIDGE_BASE_PATH,
    bodyLimit: result.data.BRIDGE_JSON_LIMIT,
    corsOrigins: result.data.BRIDGE_CORS_ORIGINS,
    logLevel: result.data.LOG_LEVEL,
  };
}

/**
 * The checked `LOG_LEVEL`, read on its own so the logger does not depend on
 * the rest of the handler configuration being valid.
 */
export function loadLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const result = envSchema.pick({ LOG_LEVEL: true }).safeParse(env);

  if (!result.success) {
    throw invalidConfig(result.error);
  }

  return result.data.LOG_LEVEL;
}

/**
 * Apply explicit overrides on top of the environment configuration.
 * Overrides go through the same checks as environment values; an override
 * left undefined keeps the environment value.
 */
export function resolveConfig(
  overrides: Partial<HandlerConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): HandlerConfig {
  const base = loadConfig(env);
  const result = overridesSchema.safeParse(overrides);

  if (!result.success) {
    throw invalidConfig(result.error);
  }

  return {
    basePath: result.data.basePath ?? base.basePath,
    bodyLimit: result.data.bodyLimit ?? base.bodyLimit,
    corsOrigins: result.data.corsOrigins ?? base.corsOrigins,
    logLevel: result.data.logLevel ?? base.logLevel,
  };
}
