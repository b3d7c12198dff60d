/**
 * Naming rules for tags, operation ids, summaries and path parameters
 *
 * Why pure functions: every name in the document is derived from route
 * metadata only, so the same route always yields the same tag, operation id
 * and parameter slug. The generator and the bindings depend on that.
 */

import { API_VERSION_PREFIX, CORE_APP_LABEL } from './constants.js';
import type { ResourceModel, Route, ViewDescriptor } from './types/introspection.js';
import type { HttpMethod } from './types/openapi.js';

/**
 * Canonical action per HTTP method
 */
export const METHOD_ACTIONS: Record<HttpMethod, string> = {
  GET: 'read',
  POST: 'create',
  PUT: 'update',
  PATCH: 'partial_update',
  DELETE: 'delete',
};

/**
 * Router actions that are replaced by the canonical method action
 */
const ROUTER_ACTIONS = ['retrieve', 'list', 'destroy', 'create'];

export interface TokenizeOptions {
  /** Prefix stripped from the raw path before the path fallback */
  pathPrefix?: string;
}

/**
 * Title-case a token: first letter after any non-letter upper-cased,
 * everything else lower-cased ("file-uploads" => "File-Uploads")
 */
export function titleCase(token: string): string {
  return token
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Path variables in order of appearance ("/a/{x}/b/{y}/" => ["x", "y"])
 */
export function pathVariables(path: string): string[] {
  return Array.from(path.matchAll(/\{([^}]+)\}/g), match => match[1]);
}

/**
 * Tokenize the route into the path token sequence
 *
 * Endpoint pieces of the parent view (when nested) and of the view itself
 * win; otherwise the path is tokenized with variables removed, and as a last
 * resort the view's display name is used. The API version prefix is removed.
 *
 * "/pulp/api/v3/artifacts/{pulp_id}/" => ["artifacts"]
 */
export function tokenizePath(path: string, view: ViewDescriptor, options: TokenizeOptions = {}): string[] {
  let tokens: string[] = [];

  if (view.parent?.endpointPieces) {
    tokens.push(...view.parent.endpointPieces);
  }

  if (view.endpointPieces) {
    tokens.push(...view.endpointPieces);
  }

  if (tokens.length === 0) {
    let stripped = path;
    if (options.pathPrefix && stripped.toLowerCase().startsWith(options.pathPrefix.toLowerCase())) {
      stripped = stripped.slice(options.pathPrefix.length);
    }
    tokens = stripped
      .replace(/\{[\w-]+\}/g, '')
      .split('/')
      .filter(Boolean);

    if (tokens.length === 0 && view.viewName) {
      tokens = view.viewName.split(/\s+/).filter(Boolean);
    }
  }

  return tokens.join('/').split(API_VERSION_PREFIX).join('').split('/');
}

/**
 * Derive the single tag of an operation
 *
 * "content/file/files" => ["Content: Files"]
 * "artifacts" => ["Artifacts"]
 *
 * An explicit tag name is used verbatim.
 */
export function deriveTags(tokens: string[], tagName?: string): string[] {
  if (tagName) {
    return [tagName];
  }

  const keys = tokens.join('/').split(API_VERSION_PREFIX).join('').split('/').map(titleCase);

  if (keys.length > 2) {
    keys.splice(keys.length - 2, 1);
  }
  if (keys.length > 1) {
    keys[0] = `${keys[0]}:`;
  }

  return [keys.join(' ')];
}

const ITEM_SEGMENT = /^\{[^}]+\}$/;

/**
 * Whether the route addresses a collection rather than a single item
 */
export function isListView(route: Pick<Route, 'action' | 'method'>, path: string): boolean {
  if (route.action !== undefined) {
    return route.action === 'list';
  }

  if (route.method !== 'GET') {
    return false;
  }

  // An alias such as "{repo_href}versions/" ends in a collection, not an item
  const segments = path.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  return last === undefined || !ITEM_SEGMENT.test(last);
}

/**
 * Resolve the action name used in operation ids
 *
 * Custom actions ("sync", "modify") are kept; router actions map to the
 * method's canonical action, with GET on a collection resolving to "list".
 */
export function resolveAction(method: HttpMethod, action: string | undefined, listView: boolean): string {
  if (action !== undefined && !ROUTER_ACTIONS.includes(action)) {
    return action;
  }

  if (method === 'GET' && listView) {
    return 'list';
  }

  return METHOD_ACTIONS[method];
}

/**
 * Normalize tokens for use in identifiers ("file-uploads" => "file_uploads")
 */
export function operationIdPrefix(tokens: string[]): string {
  return tokens
    .map(token => token.replace(/[-/]/g, '_').toLowerCase())
    .join('_');
}

/**
 * Build the operation id from the path tokens and the action
 *
 * (["content", "file", "files"], "list") => "content_file_files_list"
 */
export function buildOperationId(tokens: string[], action: string): string {
  const prefix = operationIdPrefix(tokens);
  return prefix ? `${prefix}_${action}` : action;
}

/**
 * Human summary for the standard actions, undefined for custom ones
 */
export function buildSummary(action: string, model: ResourceModel | undefined): string | undefined {
  if (!model) {
    return undefined;
  }

  const resource = model.verboseName;
  const article = /^[aeiou]/i.test(resource) ? 'an' : 'a';

  switch (action) {
    case 'read':
      return `Inspect ${article} ${resource}`;
    case 'list':
      return `List ${model.verboseNamePlural}`;
    case 'create':
      return `Create ${article} ${resource}`;
    case 'update':
      return `Update ${article} ${resource}`;
    case 'partial_update':
      return `Partially update ${article} ${resource}`;
    case 'delete':
      return `Delete ${article} ${resource}`;
    default:
      return undefined;
  }
}

/**
 * Split a CamelCase class name into lower-cased words
 *
 * "FileRepository" => ["file", "repository"]
 */
export function splitModelName(name: string): string[] {
  return (name.match(/[A-Z][^A-Z]*/g) ?? []).map(part => part.toLowerCase());
}

/**
 * Path parameter name for the resource of a model
 *
 * (FileRepository in app "file") => "file_file_repository_href"
 * (Artifact in app "core") => "artifact_href"
 */
export function parameterSlugFromModel(model: ResourceModel, prefix?: string): string {
  const parts = splitModelName(model.name);
  if (prefix) {
    parts.unshift(prefix);
  }
  if (model.appLabel !== CORE_APP_LABEL) {
    parts.unshift(model.appLabel);
  }
  parts.push('href');
  return parts.join('_');
}

/**
 * Primary key parameter name for a model ("FileRepository" => "file_repository_pk")
 */
export function pkPathParamName(model: ResourceModel): string {
  return `${splitModelName(model.name).join('_')}_pk`;
}
