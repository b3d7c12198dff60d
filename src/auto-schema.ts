/**
 * Operation synthesis for a single route and path
 *
 * Why one instance per path: a route is emitted under its concrete path and
 * under its `*_href` alias. Everything derived from the path (variables,
 * fallback tokens) must follow the path being emitted, while tags, actions
 * and components stay the same for both.
 */

import { ComponentRegistry } from './component-registry.js';
import { FieldDoesNotExistError } from './errors.js';
import type { Logger } from './logger.js';
import {
  buildOperationId,
  buildSummary,
  deriveTags,
  isListView,
  pathVariables,
  resolveAction,
  tokenizePath,
} from './naming.js';
import type { ModelField, ResourceModel, Route, Serializer, SerializerField } from './types/introspection.js';
import type {
  OperationDescriptor,
  ParameterObject,
  ReferenceObject,
  RequestBodyObject,
  ResponsesObject,
  SchemaObject,
} from './types/openapi.js';

export type Direction = 'request' | 'response';

export interface AutoSchemaOptions {
  pathPrefix?: string;
  logger?: Logger;
}

const DEFAULT_PARSERS = ['application/json', 'application/x-www-form-urlencoded', 'multipart/form-data'];
const FILE_PARSERS = ['multipart/form-data', 'application/x-www-form-urlencoded'];
const RENDERERS = ['application/json'];
const BODY_METHODS = ['POST', 'PUT', 'PATCH'];

/**
 * Regex patterns too generic to describe a path variable
 */
const CATCH_ALL_PATTERNS = ['[^/.]+', '[^/]+'];

/**
 * Field metadata that means nothing on a path parameter
 */
const IRRELEVANT_FIELD_META = ['readOnly', 'writeOnly', 'nullable', 'default'] as const;

const NO_RESPONSE_BODY = 'No response body';

export class PulpAutoSchema {
  private readonly tokens: string[];

  constructor(
    readonly route: Route,
    readonly path: string,
    private registry: ComponentRegistry,
    private options: AutoSchemaOptions = {}
  ) {
    this.tokens = tokenizePath(path, route.view, { pathPrefix: options.pathPrefix });
  }

  get method() {
    return this.route.method;
  }

  private get view() {
    return this.route.view;
  }

  private get model(): ResourceModel | undefined {
    return this.route.view.model;
  }

  tokenizePath(): string[] {
    return [...this.tokens];
  }

  getTags(): string[] {
    return deriveTags(this.tokens, this.view.tagName);
  }

  isListView(): boolean {
    return isListView(this.route, this.path);
  }

  getOperationIdAction(): string {
    return resolveAction(this.method, this.route.action, this.isListView());
  }

  getOperationId(): string {
    return buildOperationId(this.tokens, this.getOperationIdAction());
  }

  getSummary(): string | undefined {
    return buildSummary(this.getOperationIdAction(), this.model);
  }

  getDescription(): string | undefined {
    return this.route.description ?? this.view.description;
  }

  /**
   * Build the operation, or null when the route is excluded from the document
   */
  getOperation(): OperationDescriptor | null {
    if (this.route.excluded) {
      return null;
    }

    const parameters = this.getParameters();

    return {
      operationId: this.getOperationId(),
      description: this.getDescription(),
      summary: this.getSummary(),
      tags: this.getTags(),
      parameters: parameters.length > 0 ? parameters : undefined,
      requestBody: this.getRequestBody(),
      deprecated: this.route.deprecated ? true : undefined,
      responses: this.getResponseBodies(),
    };
  }

  getParameters(): ParameterObject[] {
    const parameters = this.resolvePathParameters(pathVariables(this.path));

    if (this.method === 'GET' && this.isListView()) {
      for (const filter of this.view.filters ?? []) {
        parameters.push({ ...filter, in: 'query', required: filter.required ?? false });
      }
      if (this.view.paginated) {
        parameters.push(
          {
            name: 'limit',
            in: 'query',
            required: false,
            description: 'Number of results to return per page.',
            schema: { type: 'integer' },
          },
          {
            name: 'offset',
            in: 'query',
            required: false,
            description: 'The initial index from which to return the results.',
            schema: { type: 'integer' },
          }
        );
      }
    }

    return parameters;
  }

  /**
   * Resolve path variables to parameters
   *
   * A typed regex group wins, then the model field of the same name;
   * anything unresolvable becomes a plain string parameter.
   */
  resolvePathParameters(variables: string[]): ParameterObject[] {
    return variables.map(variable => {
      let schema: SchemaObject = { type: 'string' };
      let description = '';

      const pattern = this.route.pathRegex
        ? namedGroupPattern(this.route.pathRegex, variable)
        : undefined;

      if (pattern !== undefined && !CATCH_ALL_PATTERNS.includes(pattern)) {
        schema = { type: 'string', pattern: `^${pattern}$` };
      } else if (this.model) {
        const field = this.lookupField(this.model, variable);
        if (field) {
          schema = stripFieldMeta(field.schema);
          if (schema.description === undefined && field.primaryKey) {
            description = pkDescription(this.model, field);
          }
        }
      }

      const parameter: ParameterObject = { name: variable, in: 'path', required: true, schema };
      if (description) {
        parameter.description = description;
      }
      return parameter;
    });
  }

  private lookupField(model: ResourceModel, name: string): ModelField | undefined {
    try {
      return model.getField(name);
    } catch (error) {
      if (error instanceof FieldDoesNotExistError) {
        this.options.logger?.debug('Path variable has no model field, using a string parameter', {
          variable: name,
          model: model.name,
        });
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Request media types; file fields force multipart
   */
  mapParsers(): string[] {
    const serializer = this.getRequestSerializer();
    if (serializer && BODY_METHODS.includes(this.method)) {
      const hasFile = Object.values(serializer.fields).some(field => field.file);
      if (hasFile) {
        return [...FILE_PARSERS];
      }
    }
    return [...DEFAULT_PARSERS];
  }

  getRequestSerializer(): Serializer | undefined {
    return this.route.requestSerializer ?? this.view.serializer;
  }

  getResponseSerializer(): Serializer | undefined {
    return this.route.responseSerializer ?? this.view.serializer;
  }

  getRequestBody(): RequestBodyObject | undefined {
    if (!BODY_METHODS.includes(this.method)) {
      return undefined;
    }

    const serializer = this.getRequestSerializer();
    if (!serializer) {
      return undefined;
    }

    const schema = this.resolveSerializer(serializer, 'request', this.method === 'PATCH');
    const content: RequestBodyObject['content'] = {};
    for (const mediaType of this.mapParsers()) {
      content[mediaType] = { schema };
    }

    return { content, required: true };
  }

  getResponseBodies(): ResponsesObject {
    const responses = this.buildResponses();

    if (this.method === 'POST' && this.view.createsResources && '200' in responses) {
      responses['201'] = responses['200'];
      delete responses['200'];
    }

    return responses;
  }

  private buildResponses(): ResponsesObject {
    if (this.route.responses) {
      const responses: ResponsesObject = {};
      for (const [status, response] of Object.entries(this.route.responses)) {
        responses[status] = response.serializer
          ? this.jsonResponse(this.resolveSerializer(response.serializer, 'response'), response.description)
          : { description: response.description ?? NO_RESPONSE_BODY };
      }
      return responses;
    }

    if (this.method === 'DELETE') {
      return { '204': { description: NO_RESPONSE_BODY } };
    }

    const serializer = this.getResponseSerializer();
    if (!serializer) {
      return { '200': { description: NO_RESPONSE_BODY } };
    }

    const item = this.resolveSerializer(serializer, 'response');

    if (this.method === 'GET' && this.isListView()) {
      return { '200': this.jsonResponse(this.listSchema(serializer, item)) };
    }

    return { '200': this.jsonResponse(item) };
  }

  private jsonResponse(schema: SchemaObject | ReferenceObject, description = '') {
    const content: Record<string, { schema: SchemaObject | ReferenceObject }> = {};
    for (const mediaType of RENDERERS) {
      content[mediaType] = { schema };
    }
    return { content, description };
  }

  private listSchema(serializer: Serializer, item: ReferenceObject): SchemaObject | ReferenceObject {
    if (!this.view.paginated) {
      return { type: 'array', items: item };
    }

    const name = `Paginated${componentName(serializer, 'response')}List`;
    return this.registry.resolve(name, () => ({
      type: 'object',
      required: ['count', 'results'],
      properties: {
        count: { type: 'integer', example: 123 },
        next: {
          type: 'string',
          nullable: true,
          format: 'uri',
          example: 'http://api.example.org/accounts/?offset=400&limit=100',
        },
        previous: {
          type: 'string',
          nullable: true,
          format: 'uri',
          example: 'http://api.example.org/accounts/?offset=200&limit=100',
        },
        results: { type: 'array', items: item },
      },
    }));
  }

  /**
   * Serializer to component reference, registering the component on first use
   */
  resolveSerializer(serializer: Serializer, direction: Direction, partial = false): ReferenceObject {
    return this.registry.resolve(
      componentName(serializer, direction, partial),
      () => mapSerializer(serializer, direction, partial)
    );
  }
}

/**
 * Component name of a serializer
 *
 * "FileRepositorySerializer" => "FileRepository" (request),
 * "PatchedFileRepository" (partial request), "FileRepositoryResponse" (response)
 */
export function componentName(serializer: Serializer, direction: Direction, partial = false): string {
  let name = serializer.name.endsWith('Serializer')
    ? serializer.name.slice(0, -'Serializer'.length)
    : serializer.name;

  if (partial) {
    name = `Patched${name}`;
  }
  if (direction === 'response' && !name.includes('Response')) {
    name = `${name}Response`;
  }
  return name;
}

/**
 * Component schema of a serializer for one direction
 */
export function mapSerializer(serializer: Serializer, direction: Direction, partial = false): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(serializer.fields)) {
    if (direction === 'request' && field.readOnly) continue;
    if (direction === 'response' && field.writeOnly) continue;

    properties[name] = mapSerializerField(field, direction);

    const isRequired = direction === 'request'
      ? Boolean(field.required) && !partial
      : Boolean(field.required || field.readOnly);
    if (isRequired) {
      required.push(name);
    }
  }

  const schema: SchemaObject = { type: 'object' };
  if (serializer.description) {
    schema.description = serializer.description;
  }
  schema.properties = properties;
  if (required.length > 0) {
    schema.required = required;
  }
  return schema;
}

export function mapSerializerField(field: SerializerField, direction: Direction): SchemaObject {
  const mapped: SchemaObject = { ...field.schema };
  delete mapped.additionalProperties;

  if (field.description && mapped.description === undefined) {
    mapped.description = field.description;
  }
  if (direction === 'response' && field.readOnly) {
    mapped.readOnly = true;
  }
  if (direction === 'request' && field.writeOnly) {
    mapped.writeOnly = true;
  }
  return mapped;
}

function stripFieldMeta(schema: SchemaObject): SchemaObject {
  const stripped: SchemaObject = { ...schema };
  for (const key of IRRELEVANT_FIELD_META) {
    delete stripped[key];
  }
  return stripped;
}

/**
 * Primary key description ("A UUID string identifying this artifact.")
 */
export function pkDescription(model: ResourceModel, field: ModelField): string {
  let valueType = 'unique value';
  if (field.schema.format === 'uuid') {
    valueType = 'UUID string';
  } else if (field.schema.type === 'integer') {
    valueType = 'unique integer value';
  }
  return `A ${valueType} identifying this ${model.verboseName}.`;
}

/**
 * Pattern of a named group in a route regex
 *
 * Accepts both `(?P<name>...)` and `(?<name>...)`; nested groups and
 * escaped parentheses are skipped while looking for the closing one.
 */
export function namedGroupPattern(regex: string, name: string): string | undefined {
  const openers = [`(?P<${name}>`, `(?<${name}>`];
  for (const opener of openers) {
    const start = regex.indexOf(opener);
    if (start === -1) continue;

    const begin = start + opener.length;
    let depth = 1;
    for (let i = begin; i < regex.length; i++) {
      const char = regex[i];
      if (char === '\\') {
        i++;
        continue;
      }
      if (char === '(') depth++;
      if (char === ')') depth--;
      if (depth === 0) {
        return regex.slice(begin, i);
      }
    }
  }
  return undefined;
}
