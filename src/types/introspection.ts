/**
 * Introspection capabilities consumed by the schema generator
 * 
 * Why interfaces: routing, model and serializer metadata normally come from a
 * web framework. The generator only needs these read-only views of them, so
 * any source (the route manifest, an in-memory fixture, another framework
 * adapter) can drive it.
 */

import type { HttpMethod, ParameterObject, SchemaObject } from './openapi.js';

export interface ModelField {
  name: string;
  schema: SchemaObject;
  primaryKey?: boolean;
}

export interface ResourceModel {
  /** CamelCase class name, e.g. `FileRepository` */
  name: string;
  appLabel: string;
  verboseName: string;
  verboseNamePlural: string;
  /** Throws FieldDoesNotExistError for unknown fields */
  getField(name: string): ModelField;
}

export interface SerializerField {
  schema: SchemaObject;
  readOnly?: boolean;
  writeOnly?: boolean;
  required?: boolean;
  /** Uploaded file; switches request bodies to multipart */
  file?: boolean;
  description?: string;
}

export interface Serializer {
  /** Class name, e.g. `FileRepositorySerializer` */
  name: string;
  description?: string;
  fields: Record<string, SerializerField>;
}

export interface ViewDescriptor {
  name: string;
  /** Dotted module path; the first segment names the owning plugin */
  module: string;
  endpointName?: string;
  endpointPieces?: string[];
  parent?: ViewDescriptor;
  /** Tag used verbatim instead of the derived one */
  tagName?: string;
  viewName?: string;
  model?: ResourceModel;
  serializer?: Serializer;
  /** View creates resources on POST (responds 201) */
  createsResources?: boolean;
  paginated?: boolean;
  filters?: ParameterObject[];
  description?: string;
  requiredPermission?: string;
}

export interface RouteResponse {
  description?: string;
  serializer?: Serializer;
}

export interface Route {
  /** Path pattern with `{variable}` placeholders */
  path: string;
  /** Source regex with named groups, used for typed path variables */
  pathRegex?: string;
  method: HttpMethod;
  view: ViewDescriptor;
  action?: string;
  description?: string;
  requestSerializer?: Serializer;
  responseSerializer?: Serializer;
  responses?: Record<string, RouteResponse>;
  /** Operation removed from the document */
  excluded?: boolean;
  deprecated?: boolean;
}

export interface RouteRegistry {
  getRoutes(): Route[];
}

/**
 * Inbound documentation request
 */
export interface DocumentRequest {
  query: URLSearchParams;
  /** Absolute URI for a server-relative path */
  buildAbsoluteUri(path: string): string;
  permissions?: ReadonlySet<string>;
}

export interface PermissionChecker {
  hasViewPermissions(route: Route, request: DocumentRequest): boolean;
}
