export {
  registerCorrelationId,
  getCorrelationId,
  getRequestContext,
  generateCorrelationId,
  CORRELATION_ID_HEADER,
} from './correlationId.js';
export { registerHttpLogging, type HttpLoggingOptions } from './httpLogging.js';
export {
  resolveHttpLoggingProperties,
  httpLoggingPropertiesFromEnv,
  isHealthCheckAgent,
  type HttpLoggingProperties,
  type HttpLoggingPropertiesInput,
} from './httpLoggingProperties.js';
export {
  extractRequestDetails,
  extractResponseDetails,
  extractBody,
  formatLogMessage,
  getClientIpAddress,
  MASKED_VALUE,
  type RequestDetails,
  type ResponseDetails,
} from './contentLogging.js';
export {
  registerOAuth2ResourceServer,
  requireScopes,
  AuthenticationError,
  type OAuth2ResourceServerOptions,
} from './auth.js';
