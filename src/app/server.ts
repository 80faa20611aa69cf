import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import config from '../config/env.js';
import defaultLogger, { type Logger } from '../infra/logger/logger.js';
import {
  registerApiExceptionHandler,
  type ApiExceptionHandlerOptions,
} from '../shared/errors/apiExceptionHandler.js';
import { registerRoutes } from './routes/index.js';
import { registerOpenApi, type OpenApiOptions } from './plugins/openApi.js';
import {
  registerCorrelationId,
  registerHttpLogging,
  registerOAuth2ResourceServer,
  type HttpLoggingOptions,
  type OAuth2ResourceServerOptions,
} from './middlewares/index.js';

export interface ServiceAppOptions {
  logger?: Logger;
  /** Defaults to the HTTP_LOGGING_* settings */
  httpLogging?: HttpLoggingOptions;
  /**
   * `false` disables authentication. When omitted, the resource server is
   * enabled if OAUTH2_ISSUER_URI or OAUTH2_JWKS_URI is set.
   */
  security?: OAuth2ResourceServerOptions | false;
  exceptionHandler?: ApiExceptionHandlerOptions;
  /** Generates an OpenAPI document with the standard error responses when set */
  openApi?: OpenApiOptions;
  bodyLimit?: number;
  trustProxy?: boolean;
}

function resolveSecurity(options: ServiceAppOptions): OAuth2ResourceServerOptions | undefined {
  if (options.security === false) {
    return undefined;
  }
  if (options.security) {
    return options.security;
  }
  return config.OAUTH2_ISSUER_URI || config.OAUTH2_JWKS_URI ? {} : undefined;
}

/**
 * Create and configure a Fastify server with the shared service conventions.
 * Callers register their own routes on the returned instance, through
 * plugins when they should appear in the OpenAPI document.
 */
export function createServiceApp(options: ServiceAppOptions = {}): FastifyInstance {
  const logger = options.logger ?? defaultLogger;
  const loggerInstance: FastifyBaseLogger = logger;

  const fastify = Fastify({
    logger: loggerInstance,
    disableRequestLogging: true,
    bodyLimit: options.bodyLimit ?? 1048576, // 1MB
    trustProxy: options.trustProxy ?? true,
  });

  // ============================================
  // DOCUMENTATION
  // ============================================

  if (options.openApi) {
    registerOpenApi(fastify, options.openApi);
  }

  // ============================================
  // CORE MIDDLEWARES
  // ============================================

  registerCorrelationId(fastify);

  registerHttpLogging(fastify, { logger, ...options.httpLogging });

  const security = resolveSecurity(options);
  if (security) {
    registerOAuth2ResourceServer(fastify, { logger, ...security });
  }

  // ============================================
  // ERROR HANDLING
  // ============================================

  registerApiExceptionHandler(fastify, { logger, ...options.exceptionHandler });

  // ============================================
  // ROUTES
  // ============================================

  void fastify.register(async (instance) => {
    registerRoutes(instance);
  });

  logger.info(
    {
      service: config.SERVICE_NAME,
      version: config.SERVICE_VERSION,
      env: config.NODE_ENV,
      security: security !== undefined,
      openApi: options.openApi !== undefined,
    },
    'Service app configured'
  );

  return fastify;
}
