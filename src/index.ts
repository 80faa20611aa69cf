/**
 * Service Common
 * Shared building blocks for Fastify microservices.
 */

// Bootstrap
export { createServiceApp, type ServiceAppOptions } from './app/server.js';
export * from './app/middlewares/index.js';
export {
  registerOpenApi,
  standardErrorStatuses,
  withStandardErrorResponses,
  apiErrorResponseSchema,
  fieldErrorSchema,
  type OpenApiOptions,
} from './app/plugins/openApi.js';

// Configuration
export { default as config, loadConfig, ConfigurationError, type EnvSource } from './config/env.js';
export type { EnvConfig } from './config/env.schema.js';

// Logging
export { default as logger, LoggerFactory, type Logger } from './infra/logger/logger.js';
export { SafeLogger, toJson, mask } from './shared/logging/SafeLogger.js';
export { registerSensitiveFields, type SensitiveOptions } from './shared/logging/sensitive.js';

// Request context
export { RequestContext, type Principal, type RequestContextData } from './shared/context/RequestContext.js';
export { SecurityContext } from './shared/context/SecurityContext.js';

// Errors
export * from './shared/errors/index.js';

// CSV
export * from './shared/csv/index.js';

// Domain
export { AuditableEntity, type AuditFields } from './domain/models/AuditableEntity.js';
export { SoftDeletableEntity, type SoftDeleteFields } from './domain/models/SoftDeletableEntity.js';
export { securityContextAuditor, ANONYMOUS_USER, type AuditorAware } from './domain/auditing/AuditorAware.js';
export type { IRepository, ISoftDeleteRepository, Page, Pageable, Sort } from './domain/repositories/index.js';

// Persistence
export { createDatabase, closeDatabase, buildKnexConfig, type DatabaseOptions } from './infra/db/database.js';
export { addAuditColumns, addSoftDeleteColumns } from './infra/db/schema.js';
export {
  AuditableRepository,
  type Identifiable,
  type RepositoryOptions,
} from './infra/db/repositories/AuditableRepository.js';
export { SoftDeleteRepository } from './infra/db/repositories/SoftDeleteRepository.js';
export { allOf, whereEquals, type Specification } from './infra/db/repositories/specification.js';
