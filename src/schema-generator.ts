/**
 * OpenAPI document assembly from a route registry
 *
 * Why a fresh registry per call: components and operation ids are collected
 * while paths are walked, and the docs endpoint generates one document per
 * request. Nothing survives between two `getSchema` calls except the
 * configuration passed to the constructor.
 */

import { PulpAutoSchema } from './auto-schema.js';
import { ComponentRegistry } from './component-registry.js';
import { CORE_COMPONENT, DEFAULT_SERVER_URL, LOGO_URL, OPENAPI_VERSION } from './constants.js';
import { stripTags } from './html.js';
import { allowAllPermissions } from './introspection.js';
import type { Logger } from './logger.js';
import { isListView, operationIdPrefix, parameterSlugFromModel } from './naming.js';
import type { DocumentRequest, PermissionChecker, Route, RouteRegistry } from './types/introspection.js';
import {
  HTTP_METHODS,
  type DocumentInfo,
  type LowercaseMethod,
  type ParameterObject,
  type PathsDocument,
  type PulpDocument,
} from './types/openapi.js';

export interface HookContext {
  generator: PulpSchemaGenerator;
  request?: DocumentRequest;
  public: boolean;
}

/**
 * Runs on the assembled document before logo, versions and servers are added
 */
export type PostprocessingHook = (document: PulpDocument, context: HookContext) => PulpDocument;

export interface SchemaGeneratorOptions {
  routes: RouteRegistry;
  info?: Partial<DocumentInfo>;
  /** Installed component => version, e.g. { pulpcore: '3.21.0', pulp_file: '1.11.0' } */
  componentVersions?: Record<string, string>;
  permissions?: PermissionChecker;
  /** Base URL the paths are joined onto (default "/") */
  mountUrl?: string;
  /** Prefix removed before path-based tokenization */
  pathPrefix?: string;
  hooks?: PostprocessingHook[];
  logger?: Logger;
}

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i;

const FIELD_PARAMETERS: ParameterObject[] = [
  {
    name: 'fields',
    in: 'query',
    description: 'A list of fields to include in the response.',
    schema: { type: 'string' },
  },
  {
    name: 'exclude_fields',
    in: 'query',
    description: 'A list of fields to exclude from the response.',
    schema: { type: 'string' },
  },
];

/**
 * Tracks emitted operation ids and hands out suffixed ones on collision
 */
class OperationIdRegistry {
  private owners = new Map<string, Route>();

  constructor(private logger?: Logger) {}

  claim(operationId: string, route: Route, path: string): string {
    let candidate = operationId;
    let counter = 1;
    while (this.owners.has(candidate)) {
      counter++;
      candidate = `${operationId}_${counter}`;
    }

    if (candidate !== operationId) {
      const owner = this.owners.get(operationId);
      const context = { operationId, renamedTo: candidate, path };
      if (owner === route) {
        this.logger?.debug('Alias path reuses an operation id', context);
      } else {
        this.logger?.warn('Duplicate operation id', context);
      }
    }

    this.owners.set(candidate, route);
    return candidate;
  }
}

export class PulpSchemaGenerator {
  private readonly mountUrl: string;

  constructor(private options: SchemaGeneratorOptions) {
    this.mountUrl = options.mountUrl ?? '/';
  }

  /**
   * Rename the resource variables of a path to the `*_href` style
   *
   * "/pulp/api/v3/repositories/file/file/{repository_pk}/versions/{number}/"
   *   => "{file_file_repository_version_href}"
   */
  convertEndpointPathParams(route: Route, path: string): string {
    if (!path.includes('{')) {
      return path;
    }

    const view = route.view;
    let model = view.model;
    if (!model) {
      return path;
    }

    let prefix: string | undefined;
    const parent = view.parent;
    if (parent) {
      if (isListView(route, path)) {
        model = parent.model ?? model;
      } else {
        prefix = [parent.model?.appLabel, parent.endpointName]
          .filter(Boolean)
          .join('_')
          .replace(/[-/]/g, '_')
          .toLowerCase();
      }
    }

    const slug = parameterSlugFromModel(model, prefix);
    const resourcePath = `${path.slice(0, path.lastIndexOf('}'))}}/`;
    return path.split(resourcePath).join(`{${slug}}`);
  }

  /**
   * Walk the routes and build the paths object
   */
  parse(request: DocumentRequest | undefined, isPublic: boolean, components: ComponentRegistry): PathsDocument {
    const logger = this.options.logger;
    const permissions = this.options.permissions ?? allowAllPermissions;
    const plugin = request?.query.get('plugin') ?? undefined;
    const bindings = request?.query.has('bindings') ?? false;
    const includeHtml = request?.query.has('include_html') ?? false;
    const operationIds = new OperationIdRegistry(logger);
    const result: PathsDocument = {};

    for (const route of sortRoutes(this.options.routes.getRoutes())) {
      const owner = route.view.module.split('.')[0];
      if (plugin && owner !== plugin) {
        continue;
      }

      if (!isPublic && request && !permissions.hasViewPermissions(route, request)) {
        logger?.debug('Skipping route without view permission', { path: route.path, method: route.method });
        continue;
      }

      const paths = Array.from(new Set([route.path, this.convertEndpointPathParams(route, route.path)]));

      for (const path of paths) {
        const schema = new PulpAutoSchema(route, path, components, {
          pathPrefix: this.options.pathPrefix,
          logger,
        });

        const operation = schema.getOperation();
        if (!operation) {
          logger?.debug('Route excluded from the document', { path, method: route.method });
          continue;
        }

        if (!includeHtml && operation.description !== undefined) {
          operation.description = stripTags(operation.description);
        }

        if (bindings) {
          const action = schema.getOperationIdAction();
          if (`${operationIdPrefix(schema.tokenizePath())}_${action}` === operation.operationId) {
            operation.operationId = action;
          }
        } else {
          operation.operationId = operationIds.claim(operation.operationId, route, path);
        }

        if (route.method === 'GET') {
          operation.parameters = [...(operation.parameters ?? []), ...FIELD_PARAMETERS.map(p => ({ ...p }))];
        }

        const key = this.mountPath(path);
        const entry = result[key] ?? {};
        entry[lowercaseMethod(route.method)] = operation;
        result[key] = entry;
      }
    }

    return result;
  }

  /**
   * Generate the full document
   */
  getSchema(request?: DocumentRequest, isPublic = false): PulpDocument {
    const components = new ComponentRegistry(this.options.logger);
    const paths = this.parse(request, isPublic, components);

    let document: PulpDocument = {
      openapi: OPENAPI_VERSION,
      info: this.buildInfo(),
      paths,
      components: { schemas: components.build() },
    };

    for (const hook of this.options.hooks ?? []) {
      document = hook(document, { generator: this, request, public: isPublic });
    }

    document.info['x-logo'] = { url: LOGO_URL };
    document.info['x-pulp-app-versions'] = this.appVersions();
    document.servers = [{ url: request ? request.buildAbsoluteUri('/') : DEFAULT_SERVER_URL }];

    return normalizeDocument(document);
  }

  private buildInfo(): DocumentInfo {
    const info = this.options.info ?? {};
    return {
      ...info,
      title: info.title ?? 'Pulp 3 API',
      version: info.version ?? 'v3',
    };
  }

  private appVersions(): Record<string, string> {
    const versions = this.options.componentVersions ?? {};
    const ordered: Record<string, string> = {};
    if (versions[CORE_COMPONENT] !== undefined) {
      ordered[CORE_COMPONENT] = versions[CORE_COMPONENT];
    }
    for (const [component, version] of Object.entries(versions)) {
      if (component !== CORE_COMPONENT) {
        ordered[component] = version;
      }
    }
    return ordered;
  }

  /**
   * Join a path onto the mount URL; `{href}` style paths are kept as they are
   */
  private mountPath(path: string): string {
    const relative = path.startsWith('/') ? path.slice(1) : path;
    if (relative.startsWith('{')) {
      return relative;
    }
    // Resolve the directory only, so "{" in the path is not percent-encoded
    const base = ABSOLUTE_URL.test(this.mountUrl)
      ? new URL('.', this.mountUrl).href
      : this.mountUrl.slice(0, this.mountUrl.lastIndexOf('/') + 1) || '/';
    return `${base}${relative}`;
  }
}

function lowercaseMethod(method: Route['method']): LowercaseMethod {
  switch (method) {
    case 'GET':
      return 'get';
    case 'POST':
      return 'post';
    case 'PUT':
      return 'put';
    case 'PATCH':
      return 'patch';
    case 'DELETE':
      return 'delete';
  }
}

/**
 * Sort by path, then by method in GET, POST, PUT, PATCH, DELETE order
 */
export function sortRoutes(routes: Route[]): Route[] {
  return [...routes].sort((a, b) => {
    if (a.path !== b.path) {
      return a.path < b.path ? -1 : 1;
    }
    return HTTP_METHODS.indexOf(a.method) - HTTP_METHODS.indexOf(b.method);
  });
}

/**
 * Drop undefined values so the document serializes the same way as JSON
 */
function normalizeDocument(document: PulpDocument): PulpDocument {
  const normalized: PulpDocument = JSON.parse(JSON.stringify(document));
  return normalized;
}

