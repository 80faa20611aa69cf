import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import pino from 'pino';
import config from '../../config/env.js';
import type { EnvConfig } from '../../config/env.schema.js';
import { RequestContext } from '../../shared/context/RequestContext.js';

export type Logger = PinoLogger;

export type LoggerSettings = Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL' | 'SERVICE_NAME' | 'SERVICE_VERSION'>;

/**
 * Credentials that may reach a log binding directly. Request headers are
 * masked by the HTTP logging hook before they are logged.
 */
const REDACT_PATHS = ['password', 'accessToken', 'connection.password', 'DB_PASSWORD'];

/**
 * Adds the request-scoped correlation ID to every log line
 */
function correlationMixin(): Record<string, unknown> {
  const correlationId = RequestContext.getCorrelationId();
  return correlationId ? { correlationId } : {};
}

function sharedOptions(settings: LoggerSettings): LoggerOptions {
  return {
    level: settings.LOG_LEVEL,
    mixin: correlationMixin,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };
}

/**
 * Singleton Logger Factory
 * One logger per process; modules derive children from it.
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = this.build(config);
    }
    return this.instance;
  }

  /**
   * Silent under test, pretty-printed in development, JSON lines otherwise
   */
  static build(settings: LoggerSettings, destination?: DestinationStream): Logger {
    if (settings.NODE_ENV === 'test' && !destination) {
      return pino({ level: 'silent' });
    }

    if (settings.NODE_ENV === 'development' && !destination) {
      return pino({
        ...sharedOptions(settings),
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      });
    }

    const options: LoggerOptions = {
      ...sharedOptions(settings),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: settings.SERVICE_NAME,
        version: settings.SERVICE_VERSION,
        env: settings.NODE_ENV,
      },
    };

    return destination ? pino(options, destination) : pino(options);
  }

  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }

  static reset(): void {
    this.instance = null;
  }
}

const logger = LoggerFactory.getInstance();

export default logger;
export { LoggerFactory, correlationMixin };
