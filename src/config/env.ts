import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { envSchema } from './env.schema.js';
import type { EnvConfig } from './env.schema.js';

dotenv.config();

export type EnvSource = Record<string, string | undefined>;

/**
 * Raised when the environment does not satisfy the schema
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Parse boolean from string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse integer from string
 */
function parseInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse comma separated list from string
 */
function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Validate an env-like record against the schema
 */
export function loadConfig(env: EnvSource): EnvConfig {
  try {
    return envSchema.parse({
      // Application
      NODE_ENV: env.NODE_ENV,
      LOG_LEVEL: env.LOG_LEVEL,
      SERVICE_NAME: env.SERVICE_NAME,
      SERVICE_VERSION: env.SERVICE_VERSION,

      // HTTP logging
      HTTP_LOGGING_ENABLED: parseBoolean(env.HTTP_LOGGING_ENABLED, false),
      HTTP_LOGGING_LOG_LEVEL: env.HTTP_LOGGING_LOG_LEVEL?.toLowerCase(),
      HTTP_LOGGING_INCLUDE_REQUEST_BODY: parseBoolean(env.HTTP_LOGGING_INCLUDE_REQUEST_BODY, true),
      HTTP_LOGGING_INCLUDE_RESPONSE_BODY: parseBoolean(
        env.HTTP_LOGGING_INCLUDE_RESPONSE_BODY,
        true
      ),
      HTTP_LOGGING_INCLUDE_REQUEST_HEADERS: parseBoolean(
        env.HTTP_LOGGING_INCLUDE_REQUEST_HEADERS,
        true
      ),
      HTTP_LOGGING_INCLUDE_RESPONSE_HEADERS: parseBoolean(
        env.HTTP_LOGGING_INCLUDE_RESPONSE_HEADERS,
        true
      ),
      HTTP_LOGGING_INCLUDE_QUERY_PARAMS: parseBoolean(env.HTTP_LOGGING_INCLUDE_QUERY_PARAMS, true),
      HTTP_LOGGING_INCLUDE_CLIENT_IP: parseBoolean(env.HTTP_LOGGING_INCLUDE_CLIENT_IP, true),
      HTTP_LOGGING_MAX_BODY_SIZE: parseInt(env.HTTP_LOGGING_MAX_BODY_SIZE),
      HTTP_LOGGING_EXCLUDE_PATTERNS: parseList(env.HTTP_LOGGING_EXCLUDE_PATTERNS),
      HTTP_LOGGING_INCLUDE_PATTERNS: parseList(env.HTTP_LOGGING_INCLUDE_PATTERNS),
      HTTP_LOGGING_SENSITIVE_HEADERS: parseList(env.HTTP_LOGGING_SENSITIVE_HEADERS),
      HTTP_LOGGING_LOG_ERRORS_ONLY: parseBoolean(env.HTTP_LOGGING_LOG_ERRORS_ONLY, false),
      HTTP_LOGGING_SKIP_HEALTH_CHECK_AGENTS: parseBoolean(
        env.HTTP_LOGGING_SKIP_HEALTH_CHECK_AGENTS,
        true
      ),

      // Security - OAuth2
      OAUTH2_ISSUER_URI: env.OAUTH2_ISSUER_URI || undefined,
      OAUTH2_JWKS_URI: env.OAUTH2_JWKS_URI || undefined,
      OAUTH2_AUDIENCE: env.OAUTH2_AUDIENCE,
      OAUTH2_CLOCK_TOLERANCE_SEC: parseInt(env.OAUTH2_CLOCK_TOLERANCE_SEC),

      // Database
      DB_CLIENT: env.DB_CLIENT,
      DB_HOST: env.DB_HOST,
      DB_PORT: parseInt(env.DB_PORT),
      DB_USERNAME: env.DB_USERNAME,
      DB_PASSWORD: env.DB_PASSWORD,
      DB_NAME: env.DB_NAME,
      DB_POOL_MIN: parseInt(env.DB_POOL_MIN),
      DB_POOL_MAX: parseInt(env.DB_POOL_MAX),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(
        `Environment validation failed: ${issues.join('; ')}`,
        issues
      );
    }
    throw error;
  }
}

const config: EnvConfig = loadConfig(process.env);

export default config;
export type { EnvConfig };
