/**
 * Route manifest loader and validator
 *
 * Why a manifest: the schema generator only sees routes, views, models and
 * serializers through capability interfaces. The manifest is a declarative
 * source for all four, so a document can be generated without a running
 * application. Structure is validated with zod, references between entries
 * are checked afterwards.
 */

import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { StaticResourceModel, ViewPermissionChecker } from './introspection.js';
import type {
  PermissionChecker,
  ResourceModel,
  Route,
  RouteRegistry,
  RouteResponse,
  Serializer,
  ViewDescriptor,
} from './types/introspection.js';
import type { DocumentInfo, ParameterObject, SchemaObject } from './types/openapi.js';

const schemaObject = z.custom<SchemaObject>(
  value => typeof value === 'object' && value !== null && !Array.isArray(value),
  { message: 'Expected a schema object' }
);

const modelFieldSchema = z.object({
  schema: schemaObject,
  primaryKey: z.boolean().optional(),
}).strict();

const modelSchema = z.object({
  appLabel: z.string().min(1),
  verboseName: z.string().optional(),
  verboseNamePlural: z.string().optional(),
  fields: z.record(modelFieldSchema).default({}),
}).strict();

const serializerFieldSchema = z.object({
  schema: schemaObject,
  readOnly: z.boolean().optional(),
  writeOnly: z.boolean().optional(),
  required: z.boolean().optional(),
  file: z.boolean().optional(),
  description: z.string().optional(),
}).strict();

const serializerSchema = z.object({
  description: z.string().optional(),
  fields: z.record(serializerFieldSchema).default({}),
}).strict();

const filterSchema = z.object({
  name: z.string().min(1),
  schema: schemaObject.optional(),
  description: z.string().optional(),
  required: z.boolean().optional(),
}).strict();

const viewSchema = z.object({
  module: z.string().min(1),
  endpointName: z.string().optional(),
  endpointPieces: z.array(z.string().min(1)).optional(),
  parent: z.string().optional(),
  tagName: z.string().optional(),
  viewName: z.string().optional(),
  model: z.string().optional(),
  serializer: z.string().optional(),
  createsResources: z.boolean().optional(),
  paginated: z.boolean().optional(),
  filters: z.array(filterSchema).optional(),
  description: z.string().optional(),
  requiredPermission: z.string().optional(),
}).strict();

const routeSchema = z.object({
  path: z.string().min(1),
  pathRegex: z.string().optional(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
  view: z.string().min(1),
  action: z.string().optional(),
  description: z.string().optional(),
  requestSerializer: z.string().optional(),
  responseSerializer: z.string().optional(),
  responses: z.record(z.object({
    description: z.string().optional(),
    serializer: z.string().optional(),
  }).strict()).optional(),
  excluded: z.boolean().optional(),
  deprecated: z.boolean().optional(),
}).strict();

export const manifestSchema = z.object({
  info: z.object({
    title: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
  }).default({}),
  /** Component versions; YAML reads "3.21" as a number, so numbers are coerced */
  components: z.record(z.coerce.string()).default({}),
  models: z.record(modelSchema).default({}),
  serializers: z.record(serializerSchema).default({}),
  views: z.record(viewSchema),
  routes: z.array(routeSchema),
});

export type Manifest = z.infer<typeof manifestSchema>;
type ManifestView = z.infer<typeof viewSchema>;

export type ManifestFormat = 'yaml' | 'json';

export class ManifestRegistry implements RouteRegistry {
  constructor(
    private routes: Route[],
    private views: Map<string, ViewDescriptor>
  ) {}

  getRoutes(): Route[] {
    return [...this.routes];
  }

  getView(name: string): ViewDescriptor | undefined {
    return this.views.get(name);
  }
}

export interface LoadedManifest {
  registry: ManifestRegistry;
  info: Partial<DocumentInfo>;
  componentVersions: Record<string, string>;
  permissions: PermissionChecker;
}

export class ManifestLoader {
  async load(manifestPath: string): Promise<LoadedManifest> {
    const content = await fs.readFile(manifestPath, 'utf-8');
    const format: ManifestFormat = manifestPath.endsWith('.json') ? 'json' : 'yaml';
    return this.parse(content, format);
  }

  parse(content: string, format: ManifestFormat = 'yaml'): LoadedManifest {
    const raw: unknown = format === 'json' ? JSON.parse(content) : parseYaml(content);

    const result = manifestSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ValidationError(`Invalid route manifest: ${issues.join('; ')}`, { issues });
    }

    return this.resolve(result.data);
  }

  /**
   * Turn names into objects, failing on the first dangling reference
   */
  private resolve(manifest: Manifest): LoadedManifest {
    const models = new Map<string, ResourceModel>();
    for (const [name, model] of Object.entries(manifest.models)) {
      models.set(name, new StaticResourceModel({
        name,
        appLabel: model.appLabel,
        verboseName: model.verboseName,
        verboseNamePlural: model.verboseNamePlural,
        fields: Object.entries(model.fields).map(([fieldName, field]) => ({
          name: fieldName,
          schema: field.schema,
          primaryKey: field.primaryKey,
        })),
      }));
    }

    const serializers = new Map<string, Serializer>();
    for (const [name, serializer] of Object.entries(manifest.serializers)) {
      serializers.set(name, { name, description: serializer.description, fields: serializer.fields });
    }

    const views = new Map<string, ViewDescriptor>();
    const visiting = new Set<string>();

    const lookupSerializer = (name: string | undefined, owner: string): Serializer | undefined => {
      if (name === undefined) {
        return undefined;
      }
      const serializer = serializers.get(name);
      if (!serializer) {
        throw new ValidationError(`${owner} references unknown serializer '${name}'`, { owner, serializer: name });
      }
      return serializer;
    };

    const resolveView = (name: string): ViewDescriptor => {
      const resolved = views.get(name);
      if (resolved) {
        return resolved;
      }

      const view = manifest.views[name];
      if (!view) {
        throw new ValidationError(`Unknown view '${name}'`, { view: name });
      }
      if (visiting.has(name)) {
        throw new ValidationError(`View '${name}' is its own ancestor`, { view: name, chain: Array.from(visiting) });
      }

      visiting.add(name);
      const descriptor = this.buildView(name, view, {
        parent: view.parent === undefined ? undefined : resolveView(view.parent),
        model: this.lookupModel(models, view.model, name),
        serializer: lookupSerializer(view.serializer, `View '${name}'`),
      });
      visiting.delete(name);

      views.set(name, descriptor);
      return descriptor;
    };

    for (const name of Object.keys(manifest.views)) {
      resolveView(name);
    }

    const routes = manifest.routes.map((route): Route => {
      const owner = `Route ${route.method} ${route.path}`;
      const view = views.get(route.view);
      if (!view) {
        throw new ValidationError(`${owner} references unknown view '${route.view}'`, {
          path: route.path,
          method: route.method,
          view: route.view,
        });
      }

      let responses: Record<string, RouteResponse> | undefined;
      if (route.responses) {
        responses = {};
        for (const [status, response] of Object.entries(route.responses)) {
          responses[status] = {
            description: response.description,
            serializer: lookupSerializer(response.serializer, owner),
          };
        }
      }

      return {
        path: route.path,
        pathRegex: route.pathRegex,
        method: route.method,
        view,
        action: route.action,
        description: route.description,
        requestSerializer: lookupSerializer(route.requestSerializer, owner),
        responseSerializer: lookupSerializer(route.responseSerializer, owner),
        responses,
        excluded: route.excluded,
        deprecated: route.deprecated,
      };
    });

    return {
      registry: new ManifestRegistry(routes, views),
      info: manifest.info,
      componentVersions: manifest.components,
      permissions: new ViewPermissionChecker(),
    };
  }

  private lookupModel(models: Map<string, ResourceModel>, name: string | undefined, view: string) {
    if (name === undefined) {
      return undefined;
    }
    const model = models.get(name);
    if (!model) {
      throw new ValidationError(`View '${view}' references unknown model '${name}'`, { view, model: name });
    }
    return model;
  }

  private buildView(
    name: string,
    view: ManifestView,
    references: Pick<ViewDescriptor, 'parent' | 'model' | 'serializer'>
  ): ViewDescriptor {
    return {
      name,
      module: view.module,
      endpointName: view.endpointName,
      endpointPieces: view.endpointPieces,
      tagName: view.tagName,
      viewName: view.viewName,
      createsResources: view.createsResources,
      paginated: view.paginated,
      filters: view.filters?.map(toQueryParameter),
      description: view.description,
      requiredPermission: view.requiredPermission,
      ...references,
    };
  }
}

function toQueryParameter(filter: z.infer<typeof filterSchema>): ParameterObject {
  const parameter: ParameterObject = {
    name: filter.name,
    in: 'query',
    schema: filter.schema ?? { type: 'string' },
  };
  if (filter.description !== undefined) {
    parameter.description = filter.description;
  }
  if (filter.required !== undefined) {
    parameter.required = filter.required;
  }
  return parameter;
}
