/**
 * OpenAPI document types produced by the schema generator
 * 
 * Why thin aliases: the generator emits plain OpenAPI 3.0 objects, so the
 * openapi-types definitions are used directly and only the Pulp extensions
 * are added on top.
 */

import type { OpenAPIV3 } from 'openapi-types';

export type SchemaObject = OpenAPIV3.SchemaObject;
export type ReferenceObject = OpenAPIV3.ReferenceObject;
export type ParameterObject = OpenAPIV3.ParameterObject;
export type OperationObject = OpenAPIV3.OperationObject;
export type ResponsesObject = OpenAPIV3.ResponsesObject;
export type RequestBodyObject = OpenAPIV3.RequestBodyObject;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type LowercaseMethod = Lowercase<HttpMethod>;

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Operation as emitted into the document
 */
export interface OperationDescriptor extends OperationObject {
  operationId: string;
  tags: string[];
  parameters?: ParameterObject[];
}

export type PathsDocument = Record<string, Partial<Record<LowercaseMethod, OperationDescriptor>>>;

export interface DocumentInfo extends OpenAPIV3.InfoObject {
  'x-logo'?: { url: string };
  'x-pulp-app-versions'?: Record<string, string>;
}

export interface PulpDocument {
  openapi: string;
  info: DocumentInfo;
  servers?: OpenAPIV3.ServerObject[];
  paths: PathsDocument;
  components: {
    schemas?: Record<string, SchemaObject>;
  };
}
