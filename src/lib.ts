/**
 * Library exports for programmatic usage
 */
export { PulpSchemaGenerator, sortRoutes } from './schema-generator.js';
export type { HookContext, PostprocessingHook, SchemaGeneratorOptions } from './schema-generator.js';
export { PulpAutoSchema } from './auto-schema.js';
export { deriveTags, buildOperationId, buildSummary, pkPathParamName, tokenizePath } from './naming.js';
export { ComponentRegistry } from './component-registry.js';
export { StaticResourceModel, StaticRouteRegistry, ViewPermissionChecker, allowAllPermissions } from './introspection.js';
export { ManifestLoader, ManifestRegistry } from './manifest-loader.js';
export type { LoadedManifest } from './manifest-loader.js';
export { DocsServer } from './docs-server.js';
export type { DocsServerConfig, PermissionResolver } from './docs-server.js';
export { Restlib } from './restlib.js';
export {
  PulpConnection,
  RepoConnection,
  ConsumerConnection,
  ConsumerGroupConnection,
  PackageConnection,
  UserConnection,
  ErrataConnection,
  connectionOptionsFromConfig,
} from './connections.js';
export type { ConnectionOptions } from './connections.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { ConsoleLogger, JsonLogger, createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { MetricsCollector } from './metrics.js';
export { PulpError, ValidationError, ConfigurationError, FieldDoesNotExistError, TransportError } from './errors.js';
export type * from './types/introspection.js';
export type * from './types/openapi.js';
export type * from './types/pulp.js';
