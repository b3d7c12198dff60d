/**
 * In-memory implementations of the introspection capabilities
 */

import { FieldDoesNotExistError } from './errors.js';
import type {
  DocumentRequest,
  ModelField,
  PermissionChecker,
  ResourceModel,
  Route,
  RouteRegistry,
} from './types/introspection.js';

export interface StaticModelOptions {
  name: string;
  appLabel: string;
  verboseName?: string;
  verboseNamePlural?: string;
  fields?: ModelField[];
}

/**
 * Model backed by a fixed field list
 *
 * Verbose names default the way the ORM does it: words of the class name
 * lower-cased and space-separated, plural with a trailing "s".
 */
export class StaticResourceModel implements ResourceModel {
  readonly name: string;
  readonly appLabel: string;
  readonly verboseName: string;
  readonly verboseNamePlural: string;
  private fields = new Map<string, ModelField>();

  constructor(options: StaticModelOptions) {
    this.name = options.name;
    this.appLabel = options.appLabel;
    this.verboseName = options.verboseName ?? defaultVerboseName(options.name);
    this.verboseNamePlural = options.verboseNamePlural ?? `${this.verboseName}s`;
    for (const field of options.fields ?? []) {
      this.fields.set(field.name, field);
    }
  }

  getField(name: string): ModelField {
    const field = this.fields.get(name);
    if (!field) {
      throw new FieldDoesNotExistError(this.name, name);
    }
    return field;
  }
}

function defaultVerboseName(className: string): string {
  return className
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .trim();
}

export class StaticRouteRegistry implements RouteRegistry {
  constructor(private routes: Route[]) {}

  getRoutes(): Route[] {
    return [...this.routes];
  }
}

/**
 * Allows a route when its view requires no permission or the request
 * carries the required one
 */
export class ViewPermissionChecker implements PermissionChecker {
  hasViewPermissions(route: Route, request: DocumentRequest): boolean {
    const required = route.view.requiredPermission;
    if (!required) {
      return true;
    }
    return request.permissions?.has(required) ?? false;
  }
}

export const allowAllPermissions: PermissionChecker = {
  hasViewPermissions: () => true,
};
