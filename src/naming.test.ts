/**
 * Unit tests for tag, operation id, summary and slug derivation
 */

import { describe, it, expect } from 'vitest';
import {
  buildOperationId,
  buildSummary,
  deriveTags,
  isListView,
  parameterSlugFromModel,
  pathVariables,
  pkPathParamName,
  resolveAction,
  splitModelName,
  titleCase,
  tokenizePath,
} from './naming.js';
import { StaticResourceModel } from './introspection.js';
import {
  artifactModel,
  artifactView,
  fileRepositoryModel,
  fileRepositoryView,
  repositoryVersionModel,
  repositoryVersionView,
  statusView,
} from './testing/fixtures.js';

describe('titleCase', () => {
  it('should capitalize after non-letters', () => {
    expect(titleCase('file')).toBe('File');
    expect(titleCase('file-uploads')).toBe('File-Uploads');
    expect(titleCase('ansible_collection')).toBe('Ansible_Collection');
    expect(titleCase('v3api')).toBe('V3Api');
  });

  it('should lower-case the rest', () => {
    expect(titleCase('CONTENT')).toBe('Content');
  });
});

describe('pathVariables', () => {
  it('should list variables in order', () => {
    expect(pathVariables('/a/{repository_pk}/versions/{number}/')).toEqual(['repository_pk', 'number']);
  });

  it('should return empty list for static paths', () => {
    expect(pathVariables('/pulp/api/v3/status/')).toEqual([]);
  });
});

describe('tokenizePath', () => {
  it('should use endpoint pieces', () => {
    expect(tokenizePath('/pulp/api/v3/repositories/file/file/', fileRepositoryView))
      .toEqual(['repositories', 'file', 'file']);
  });

  it('should prepend the parent endpoint pieces for nested views', () => {
    expect(tokenizePath('/pulp/api/v3/repositories/file/file/{repository_pk}/versions/', repositoryVersionView))
      .toEqual(['repositories', 'file', 'file', 'versions']);
  });

  it('should fall back to the path without variables and version prefix', () => {
    const view = { name: 'OrphansView', module: 'pulpcore.app.views' };
    expect(tokenizePath('/pulp/api/v3/orphans/{id}/cleanup/', view)).toEqual(['orphans', 'cleanup']);
  });

  it('should strip the configured path prefix', () => {
    const view = { name: 'OrphansView', module: 'pulpcore.app.views' };
    expect(tokenizePath('/api/orphans/', view, { pathPrefix: '/api' })).toEqual(['orphans']);
  });

  it('should fall back to the view name when the path is only variables', () => {
    const view = { name: 'HrefView', module: 'pulpcore.app.views', viewName: 'Access Policy' };
    expect(tokenizePath('{access_policy_href}', view)).toEqual(['Access', 'Policy']);
  });

  it('should be deterministic', () => {
    const first = tokenizePath('/pulp/api/v3/status/', statusView);
    const second = tokenizePath('/pulp/api/v3/status/', statusView);
    expect(first).toEqual(second);
    expect(first).toEqual(['status']);
  });
});

describe('deriveTags', () => {
  it('should collapse three tokens to "A: C"', () => {
    expect(deriveTags(['a', 'b', 'c'])).toEqual(['A: C']);
  });

  it('should derive plugin tags', () => {
    expect(deriveTags(['content', 'file', 'files'])).toEqual(['Content: Files']);
    expect(deriveTags(['repositories', 'file', 'file', 'versions'])).toEqual(['Repositories: File Versions']);
  });

  it('should add a colon for two tokens', () => {
    expect(deriveTags(['contentguards', 'rbac'])).toEqual(['Contentguards: Rbac']);
  });

  it('should return a bare tag for a single token', () => {
    expect(deriveTags(['artifacts'])).toEqual(['Artifacts']);
  });

  it('should use the explicit tag name verbatim', () => {
    expect(deriveTags(['artifacts'], 'Pulp: Customized Tag')).toEqual(['Pulp: Customized Tag']);
  });
});

describe('isListView', () => {
  it('should trust a declared action', () => {
    expect(isListView({ method: 'GET', action: 'list' }, '/x/{id}/')).toBe(true);
    expect(isListView({ method: 'GET', action: 'retrieve' }, '/x/')).toBe(false);
  });

  it('should inspect the last path segment without an action', () => {
    expect(isListView({ method: 'GET' }, '/pulp/api/v3/status/')).toBe(true);
    expect(isListView({ method: 'GET' }, '/pulp/api/v3/tasks/{pulp_id}/')).toBe(false);
    expect(isListView({ method: 'POST' }, '/pulp/api/v3/tasks/')).toBe(false);
  });

  it('should treat a static segment after a renamed parent as a collection', () => {
    expect(isListView({ method: 'GET' }, '{file_file_repository_href}versions/')).toBe(true);
    expect(isListView({ method: 'GET' }, '{file_file_repository_version_href}')).toBe(false);
  });
});

describe('resolveAction', () => {
  it('should map methods to canonical actions', () => {
    expect(resolveAction('GET', 'retrieve', false)).toBe('read');
    expect(resolveAction('POST', 'create', false)).toBe('create');
    expect(resolveAction('PUT', undefined, false)).toBe('update');
    expect(resolveAction('PATCH', undefined, false)).toBe('partial_update');
    expect(resolveAction('DELETE', 'destroy', false)).toBe('delete');
  });

  it('should resolve GET on a collection to list', () => {
    expect(resolveAction('GET', 'list', true)).toBe('list');
    expect(resolveAction('GET', undefined, true)).toBe('list');
  });

  it('should keep custom actions verbatim', () => {
    expect(resolveAction('POST', 'sync', false)).toBe('sync');
    expect(resolveAction('POST', 'modify', false)).toBe('modify');
  });
});

describe('buildOperationId', () => {
  it('should join normalized tokens and action', () => {
    expect(buildOperationId(['repositories', 'file', 'file'], 'sync')).toBe('repositories_file_file_sync');
    expect(buildOperationId(['content', 'file-uploads'], 'partial_update')).toBe('content_file_uploads_partial_update');
    expect(buildOperationId(['Access', 'Policy'], 'read')).toBe('access_policy_read');
  });

  it('should return the bare action without tokens', () => {
    expect(buildOperationId([], 'read')).toBe('read');
  });
});

describe('buildSummary', () => {
  it('should describe standard actions', () => {
    expect(buildSummary('read', fileRepositoryModel)).toBe('Inspect a file repository');
    expect(buildSummary('list', fileRepositoryModel)).toBe('List file repositories');
    expect(buildSummary('create', fileRepositoryModel)).toBe('Create a file repository');
    expect(buildSummary('update', fileRepositoryModel)).toBe('Update a file repository');
    expect(buildSummary('partial_update', fileRepositoryModel)).toBe('Partially update a file repository');
    expect(buildSummary('delete', fileRepositoryModel)).toBe('Delete a file repository');
  });

  it('should use "an" before vowels', () => {
    expect(buildSummary('read', artifactModel)).toBe('Inspect an artifact');
    expect(buildSummary('list', artifactModel)).toBe('List artifacts');
  });

  it('should return undefined without model or for custom actions', () => {
    expect(buildSummary('read', undefined)).toBeUndefined();
    expect(buildSummary('sync', fileRepositoryModel)).toBeUndefined();
  });
});

describe('parameterSlugFromModel', () => {
  it('should prefix plugin models with their app label', () => {
    expect(parameterSlugFromModel(fileRepositoryModel)).toBe('file_file_repository_href');
  });

  it('should not prefix core models', () => {
    expect(parameterSlugFromModel(artifactModel)).toBe('artifact_href');
  });

  it('should insert the prefix after the app label', () => {
    expect(parameterSlugFromModel(repositoryVersionModel, 'file_file')).toBe('file_file_repository_version_href');
    const model = new StaticResourceModel({ name: 'FileDistribution', appLabel: 'file' });
    expect(parameterSlugFromModel(model, 'x')).toBe('file_x_file_distribution_href');
  });
});

describe('splitModelName / pkPathParamName', () => {
  it('should split CamelCase names', () => {
    expect(splitModelName('RepositoryVersion')).toEqual(['repository', 'version']);
    expect(splitModelName('RPMPackage')).toEqual(['r', 'p', 'm', 'package']);
  });

  it('should build primary key parameter names', () => {
    expect(pkPathParamName(fileRepositoryModel)).toBe('file_repository_pk');
  });
});

describe('fixture views', () => {
  it('should keep artifact tokens flat', () => {
    expect(tokenizePath('/pulp/api/v3/artifacts/', artifactView)).toEqual(['artifacts']);
  });
});
