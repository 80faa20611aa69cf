/**
 * HTTP Request/Response Logging
 *
 * Logs each exchange as two structured lines: the request once its body is
 * parsed, the response once it has been sent. Disabled unless
 * `HTTP_LOGGING_ENABLED=true` or `properties.enabled` is set.
 *
 * @example
 * registerHttpLogging(fastify, { properties: { enabled: true, excludePatterns: ['/internal/**'] } });
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import defaultLogger, { type Logger } from '../../infra/logger/logger.js';
import { RequestContext, type RequestContextData } from '../../shared/context/RequestContext.js';
import { matchesAny } from '../../shared/utils/pathMatcher.js';
import {
  bodyContent,
  extractBody,
  extractRequestDetails,
  extractResponseDetails,
  formatLogMessage,
  splitUrl,
} from './contentLogging.js';
import {
  httpLoggingPropertiesFromEnv,
  isHealthCheckAgent,
  resolveHttpLoggingProperties,
  type HttpLoggingProperties,
  type HttpLoggingPropertiesInput,
} from './httpLoggingProperties.js';

export interface HttpLoggingOptions {
  /** Overrides the HTTP_LOGGING_* environment configuration */
  properties?: HttpLoggingPropertiesInput;
  logger?: Logger;
}

interface ExchangeState {
  requestLogged: boolean;
  context?: RequestContextData;
  responseBody?: string;
}

type LogLevel = HttpLoggingProperties['logLevel'];

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export function responseLogLevel(statusCode: number, configured: LogLevel): LogLevel {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return configured;
}

export function shouldSkipLogging(properties: HttpLoggingProperties, request: FastifyRequest): boolean {
  const { path } = splitUrl(request.url);

  if (properties.includePatterns.length > 0 && !matchesAny(properties.includePatterns, path)) {
    return true;
  }

  if (matchesAny(properties.excludePatterns, path)) {
    return true;
  }

  return isHealthCheckAgent(properties, request.headers['user-agent']);
}

/**
 * Register HTTP logging hooks
 * Returns whether logging was enabled.
 */
export function registerHttpLogging(fastify: FastifyInstance, options: HttpLoggingOptions = {}): boolean {
  const properties = options.properties
    ? resolveHttpLoggingProperties(options.properties)
    : httpLoggingPropertiesFromEnv();
  const log = options.logger ?? defaultLogger;

  if (!properties.enabled) {
    return false;
  }

  log.info(
    {
      logLevel: properties.logLevel,
      maxBodySize: properties.maxBodySize,
      includePatterns: properties.includePatterns,
      excludePatterns: properties.excludePatterns,
      logErrorsOnly: properties.logErrorsOnly,
    },
    'HTTP request/response logging enabled'
  );

  const exchanges = new WeakMap<FastifyRequest, ExchangeState>();

  const logRequest = (request: FastifyRequest, state: ExchangeState): void => {
    state.requestLogged = true;

    const details = extractRequestDetails(request, properties);
    let body: string | undefined;
    if (properties.includeRequestBody && BODY_METHODS.has(request.method)) {
      const content = bodyContent(request.body);
      body = content === undefined ? undefined : extractBody(content, properties.maxBodySize);
    }

    log[properties.logLevel]({ ...details, body }, formatLogMessage('HTTP Request', details));
  };

  const logResponse = (reply: FastifyReply, state: ExchangeState): void => {
    const details = extractResponseDetails(reply, properties);
    const level = responseLogLevel(details.status, properties.logLevel);

    log[level](
      { ...details, durationMs: Math.round(reply.elapsedTime), body: state.responseBody },
      formatLogMessage('HTTP Response', details)
    );
  };

  const guarded = (phase: string, fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      log.warn({ err, phase }, 'Failed to log HTTP exchange');
    }
  };

  fastify.addHook('onRequest', (request, _reply, done) => {
    guarded('request', () => {
      if (!shouldSkipLogging(properties, request)) {
        exchanges.set(request, { requestLogged: false, context: RequestContext.get() });
      }
    });
    done();
  });

  fastify.addHook('preHandler', (request, _reply, done) => {
    const state = exchanges.get(request);
    if (state) {
      state.context = state.context ?? RequestContext.get();
      if (!properties.logErrorsOnly) {
        guarded('request', () => logRequest(request, state));
      }
    }
    done();
  });

  fastify.addHook('onSend', (request, _reply, payload, done) => {
    const state = exchanges.get(request);
    if (state && properties.includeResponseBody) {
      guarded('response', () => {
        const content = bodyContent(payload);
        state.responseBody = content === undefined ? undefined : extractBody(content, properties.maxBodySize);
      });
    }
    done(null, payload);
  });

  fastify.addHook('onResponse', (request, reply, done) => {
    const state = exchanges.get(request);
    exchanges.delete(request);

    if (!state || (properties.logErrorsOnly && reply.statusCode < 400)) {
      done();
      return;
    }

    const emit = (): void => {
      guarded('response', () => {
        // Requests rejected before the handler (404, 401, bad body) are logged here
        if (!state.requestLogged) {
          logRequest(request, state);
        }
        logResponse(reply, state);
      });
    };

    if (state.context && !RequestContext.get()) {
      RequestContext.run(state.context, emit);
    } else {
      emit();
    }
    done();
  });

  return true;
}
