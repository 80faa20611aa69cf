import { z } from 'zod';

/**
 * Environment variable validation schema using Zod
 * All configuration is validated at load time - fail fast on misconfiguration
 */
export const envSchema = z.object({
  // ============================================
  // APPLICATION
  // ============================================
  NODE_ENV: z.enum(['development', 'production', 'staging', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  SERVICE_NAME: z.string().min(1).default('service'),
  SERVICE_VERSION: z.string().default('1.0.0'),

  // ============================================
  // HTTP LOGGING
  // ============================================
  HTTP_LOGGING_ENABLED: z.boolean().default(false),
  HTTP_LOGGING_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('debug'),
  HTTP_LOGGING_INCLUDE_REQUEST_BODY: z.boolean().default(true),
  HTTP_LOGGING_INCLUDE_RESPONSE_BODY: z.boolean().default(true),
  HTTP_LOGGING_INCLUDE_REQUEST_HEADERS: z.boolean().default(true),
  HTTP_LOGGING_INCLUDE_RESPONSE_HEADERS: z.boolean().default(true),
  HTTP_LOGGING_INCLUDE_QUERY_PARAMS: z.boolean().default(true),
  HTTP_LOGGING_INCLUDE_CLIENT_IP: z.boolean().default(true),
  HTTP_LOGGING_MAX_BODY_SIZE: z.number().int().min(0).default(10000),
  HTTP_LOGGING_EXCLUDE_PATTERNS: z.array(z.string()).optional(),
  HTTP_LOGGING_INCLUDE_PATTERNS: z.array(z.string()).optional(),
  HTTP_LOGGING_SENSITIVE_HEADERS: z.array(z.string()).optional(),
  HTTP_LOGGING_LOG_ERRORS_ONLY: z.boolean().default(false),
  HTTP_LOGGING_SKIP_HEALTH_CHECK_AGENTS: z.boolean().default(true),

  // ============================================
  // SECURITY - OAUTH2 RESOURCE SERVER
  // ============================================
  OAUTH2_ISSUER_URI: z.string().url().optional(),
  OAUTH2_JWKS_URI: z.string().url().optional(),
  OAUTH2_AUDIENCE: z.string().min(1).default('https://api.example.com'),
  OAUTH2_CLOCK_TOLERANCE_SEC: z.number().int().min(0).default(30),

  // ============================================
  // DATABASE
  // ============================================
  DB_CLIENT: z.string().min(1).default('mysql2'),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.number().int().positive().default(3306),
  DB_USERNAME: z.string().min(1).default('root'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().min(1).default('service'),
  DB_POOL_MIN: z.number().int().min(0).default(2),
  DB_POOL_MAX: z.number().int().positive().default(10),
});

/**
 * Type definition for the validated environment configuration
 */
export type EnvConfig = z.infer<typeof envSchema>;
