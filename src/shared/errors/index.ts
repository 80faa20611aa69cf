/**
 * Error Handling Module
 */

// Error classes
export {
  ServiceError,
  InvalidRequestError,
  ResourceNotFoundError,
  BusinessError,
  ClientError,
  ServiceUnavailableError,
  HardDeleteNotAllowedError,
  getRootCause,
  type ServiceErrorOptions,
} from './ServiceError.js';

// Response format
export {
  ApiErrorType,
  buildApiErrorResponse,
  fieldError,
  type ApiErrorResponse,
  type FieldError,
} from './ApiErrorResponse.js';

// HTTP exception handler
export {
  registerApiExceptionHandler,
  createApiExceptionHandler,
  notFoundHandler,
  mapError,
  type ApiExceptionHandlerOptions,
  type ErrorMapper,
  type ErrorMapping,
} from './apiExceptionHandler.js';
