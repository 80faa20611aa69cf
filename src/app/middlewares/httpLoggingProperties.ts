/**
 * HTTP Logging Properties
 * Options for the request/response logging hook, validated with Zod.
 * Defaults come from the HTTP_LOGGING_* environment variables.
 */
import { z } from 'zod';
import config from '../../config/env.js';

export const DEFAULT_EXCLUDE_PATTERNS = ['/health/**', '/ready', '/docs/**'];

export const DEFAULT_SENSITIVE_HEADERS = [
  'Authorization',
  'Cookie',
  'Set-Cookie',
  'X-API-Key',
  'X-Auth-Token',
  'Proxy-Authorization',
  'WWW-Authenticate',
];

export const DEFAULT_HEALTH_CHECK_USER_AGENT_PREFIXES = ['kube-probe', 'ELB-HealthChecker', 'GoogleHC'];

export const httpLoggingPropertiesSchema = z.object({
  enabled: z.boolean().default(false),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('debug'),
  includeRequestBody: z.boolean().default(true),
  includeResponseBody: z.boolean().default(true),
  includeRequestHeaders: z.boolean().default(true),
  includeResponseHeaders: z.boolean().default(true),
  includeQueryParams: z.boolean().default(true),
  includeClientIp: z.boolean().default(true),
  maxBodySize: z.number().int().min(0).default(10000),
  excludePatterns: z.array(z.string()).default(DEFAULT_EXCLUDE_PATTERNS),
  includePatterns: z.array(z.string()).default([]),
  sensitiveHeaders: z.array(z.string()).default(DEFAULT_SENSITIVE_HEADERS),
  logErrorsOnly: z.boolean().default(false),
  skipHealthCheckAgents: z.boolean().default(true),
  healthCheckUserAgentPrefixes: z.array(z.string()).default(DEFAULT_HEALTH_CHECK_USER_AGENT_PREFIXES),
});

export type HttpLoggingProperties = z.infer<typeof httpLoggingPropertiesSchema>;
export type HttpLoggingPropertiesInput = z.input<typeof httpLoggingPropertiesSchema>;

/**
 * Resolve properties, filling unspecified options with defaults
 */
export function resolveHttpLoggingProperties(
  input: HttpLoggingPropertiesInput = {}
): HttpLoggingProperties {
  return httpLoggingPropertiesSchema.parse(input);
}

/**
 * Properties derived from the HTTP_LOGGING_* environment variables
 */
export function httpLoggingPropertiesFromEnv(): HttpLoggingProperties {
  return resolveHttpLoggingProperties({
    enabled: config.HTTP_LOGGING_ENABLED,
    logLevel: config.HTTP_LOGGING_LOG_LEVEL,
    includeRequestBody: config.HTTP_LOGGING_INCLUDE_REQUEST_BODY,
    includeResponseBody: config.HTTP_LOGGING_INCLUDE_RESPONSE_BODY,
    includeRequestHeaders: config.HTTP_LOGGING_INCLUDE_REQUEST_HEADERS,
    includeResponseHeaders: config.HTTP_LOGGING_INCLUDE_RESPONSE_HEADERS,
    includeQueryParams: config.HTTP_LOGGING_INCLUDE_QUERY_PARAMS,
    includeClientIp: config.HTTP_LOGGING_INCLUDE_CLIENT_IP,
    maxBodySize: config.HTTP_LOGGING_MAX_BODY_SIZE,
    excludePatterns: config.HTTP_LOGGING_EXCLUDE_PATTERNS,
    includePatterns: config.HTTP_LOGGING_INCLUDE_PATTERNS,
    sensitiveHeaders: config.HTTP_LOGGING_SENSITIVE_HEADERS,
    logErrorsOnly: config.HTTP_LOGGING_LOG_ERRORS_ONLY,
    skipHealthCheckAgents: config.HTTP_LOGGING_SKIP_HEALTH_CHECK_AGENTS,
  });
}

/**
 * Whether the user agent belongs to a load balancer or orchestrator health checker
 */
export function isHealthCheckAgent(
  properties: HttpLoggingProperties,
  userAgent: string | undefined
): boolean {
  if (!properties.skipHealthCheckAgents || !userAgent) {
    return false;
  }

  const lowerUserAgent = userAgent.toLowerCase();
  return properties.healthCheckUserAgentPrefixes.some((prefix) =>
    lowerUserAgent.startsWith(prefix.toLowerCase())
  );
}
