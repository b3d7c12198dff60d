/**
 * Shared fixtures: a small plugin layout with a core resource, a plugin
 * repository and versions nested under it
 */

import { StaticResourceModel } from '../introspection.js';
import type { DocumentRequest, Route, Serializer, ViewDescriptor } from '../types/introspection.js';

export const artifactModel = new StaticResourceModel({
  name: 'Artifact',
  appLabel: 'core',
  fields: [
    { name: 'pulp_id', schema: { type: 'string', format: 'uuid', readOnly: true }, primaryKey: true },
    { name: 'sha256', schema: { type: 'string', nullable: true, default: null } },
  ],
});

export const fileRepositoryModel = new StaticResourceModel({
  name: 'FileRepository',
  appLabel: 'file',
  verboseNamePlural: 'file repositories',
  fields: [
    { name: 'pulp_id', schema: { type: 'string', format: 'uuid', readOnly: true }, primaryKey: true },
  ],
});

export const repositoryVersionModel = new StaticResourceModel({
  name: 'RepositoryVersion',
  appLabel: 'core',
  fields: [
    { name: 'pulp_id', schema: { type: 'string', format: 'uuid' }, primaryKey: true },
    {
      name: 'number',
      schema: { type: 'integer', readOnly: true, description: 'Version number.' },
    },
  ],
});

export const artifactSerializer: Serializer = {
  name: 'ArtifactSerializer',
  fields: {
    pulp_href: { schema: { type: 'string', format: 'uri' }, readOnly: true },
    file: { schema: { type: 'string', format: 'binary' }, file: true, writeOnly: true, required: true },
    sha256: { schema: { type: 'string', nullable: true } },
  },
};

export const fileRepositorySerializer: Serializer = {
  name: 'FileRepositorySerializer',
  description: 'Serializer for File Repositories.',
  fields: {
    pulp_href: { schema: { type: 'string', format: 'uri' }, readOnly: true },
    name: { schema: { type: 'string' }, required: true, description: 'A unique name for this repository.' },
    pulp_labels: { schema: { type: 'object', additionalProperties: { type: 'string' } } },
  },
};

export const repositoryVersionSerializer: Serializer = {
  name: 'RepositoryVersionSerializer',
  fields: {
    pulp_href: { schema: { type: 'string', format: 'uri' }, readOnly: true },
    number: { schema: { type: 'integer' }, readOnly: true },
  },
};

export const asyncOperationResponseSerializer: Serializer = {
  name: 'AsyncOperationResponseSerializer',
  fields: {
    task: { schema: { type: 'string', format: 'uri' }, required: true },
  },
};

export const repositorySyncURLSerializer: Serializer = {
  name: 'RepositorySyncURLSerializer',
  fields: {
    remote: { schema: { type: 'string', format: 'uri' } },
    mirror: { schema: { type: 'boolean', default: false } },
  },
};

export const artifactView: ViewDescriptor = {
  name: 'ArtifactViewSet',
  module: 'pulpcore.app.viewsets',
  endpointName: 'artifacts',
  endpointPieces: ['artifacts'],
  model: artifactModel,
  serializer: artifactSerializer,
  createsResources: true,
  paginated: true,
  filters: [
    { name: 'sha256', in: 'query', schema: { type: 'string' } },
  ],
  description: 'A customized named ModelViewSet that knows how to register itself with the router.',
};

export const fileRepositoryView: ViewDescriptor = {
  name: 'FileRepositoryViewSet',
  module: 'pulp_file.app.viewsets',
  endpointName: 'file',
  endpointPieces: ['repositories', 'file', 'file'],
  model: fileRepositoryModel,
  serializer: fileRepositorySerializer,
  createsResources: true,
  paginated: true,
  description: '<p>FileRepository represents a single file repository, to which content can be synced, added, or removed.</p>',
  requiredPermission: 'file.view_filerepository',
};

export const repositoryVersionView: ViewDescriptor = {
  name: 'FileRepositoryVersionViewSet',
  module: 'pulp_file.app.viewsets',
  endpointName: 'versions',
  endpointPieces: ['versions'],
  parent: fileRepositoryView,
  model: repositoryVersionModel,
  serializer: repositoryVersionSerializer,
  paginated: true,
};

export const statusView: ViewDescriptor = {
  name: 'StatusView',
  module: 'pulpcore.app.views',
  viewName: 'Status',
};

const REPOS = '/pulp/api/v3/repositories/file/file/';

/**
 * Full route table of the fixture plugin layout
 */
export function createRoutes(): Route[] {
  return [
    { path: '/pulp/api/v3/artifacts/', method: 'GET', view: artifactView, action: 'list' },
    { path: '/pulp/api/v3/artifacts/', method: 'POST', view: artifactView, action: 'create' },
    { path: '/pulp/api/v3/artifacts/{pulp_id}/', method: 'GET', view: artifactView, action: 'retrieve' },
    { path: '/pulp/api/v3/artifacts/{pulp_id}/', method: 'DELETE', view: artifactView, action: 'destroy' },
    { path: REPOS, method: 'GET', view: fileRepositoryView, action: 'list' },
    { path: REPOS, method: 'POST', view: fileRepositoryView, action: 'create' },
    { path: `${REPOS}{pulp_id}/`, method: 'GET', view: fileRepositoryView, action: 'retrieve' },
    { path: `${REPOS}{pulp_id}/`, method: 'PATCH', view: fileRepositoryView, action: 'partial_update' },
    {
      path: `${REPOS}{pulp_id}/sync/`,
      method: 'POST',
      view: fileRepositoryView,
      action: 'sync',
      description: 'Trigger an asynchronous task to sync content.',
      requestSerializer: repositorySyncURLSerializer,
      responses: { '202': { serializer: asyncOperationResponseSerializer } },
    },
    { path: `${REPOS}{repository_pk}/versions/`, method: 'GET', view: repositoryVersionView, action: 'list' },
    {
      path: `${REPOS}{repository_pk}/versions/{number}/`,
      method: 'GET',
      view: repositoryVersionView,
      action: 'retrieve',
      pathRegex: '^pulp/api/v3/repositories/file/file/(?P<repository_pk>[^/.]+)/versions/(?P<number>[0-9]+)/$',
    },
    { path: '/pulp/api/v3/status/', method: 'GET', view: statusView },
  ];
}

/**
 * Documentation request stand-in
 */
export function createDocumentRequest(
  query = '',
  options: { origin?: string; permissions?: string[] } = {}
): DocumentRequest {
  const origin = options.origin ?? 'https://pulp.example.com';
  return {
    query: new URLSearchParams(query),
    buildAbsoluteUri: (path: string) => `${origin}${path}`,
    permissions: options.permissions ? new Set(options.permissions) : undefined,
  };
}
