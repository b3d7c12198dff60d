/**
 * Wire types of the legacy Pulp management API
 *
 * Field names follow the server's JSON. Servers add fields over time, so
 * every resource keeps an index signature for the ones not listed here.
 */

export interface CertData {
  ca?: string;
  cert?: string;
  key?: string;
}

export interface Repository {
  id: string;
  name: string;
  arch: string;
  feed?: string | null;
  use_symlinks?: boolean;
  sync_schedule?: string | null;
  cert_data?: CertData | null;
  /** Deferred fields, fetched separately by `RepoConnection.repository` */
  packages?: unknown;
  packagegroups?: unknown;
  packagegroupcategories?: unknown;
  [field: string]: unknown;
}

export interface RepositoryInput {
  id: string;
  name: string;
  arch: string;
  feed?: string;
  symlinks?: boolean;
  syncSchedule?: string;
  certData?: CertData;
}

export type PackageGroupType = 'mandatory' | 'default' | 'optional' | 'conditional';

export interface Consumer {
  id: string;
  description: string;
  /** Deferred fields, fetched separately by `ConsumerConnection.consumer` */
  package_profile?: unknown;
  repoids?: string[];
  [field: string]: unknown;
}

export interface ConsumerGroup {
  id: string;
  description: string;
  consumerids: string[];
  [field: string]: unknown;
}

export interface Package {
  id?: string;
  name: string;
  epoch: string;
  version: string;
  release: string;
  arch: string;
  description: string;
  checksum_type: string;
  checksum: string;
  filename: string;
  [field: string]: unknown;
}

export interface User {
  id?: string;
  login: string;
  password?: string | null;
  name?: string | null;
  [field: string]: unknown;
}

export interface Erratum {
  id: string;
  title: string;
  description: string;
  version: string;
  release: string;
  type: string;
  status?: string;
  updated?: string;
  issued?: string;
  pushcount?: string;
  update_id?: string;
  from_str?: string;
  reboot_suggested?: boolean | string;
  references?: unknown[];
  pkglist?: unknown[];
  [field: string]: unknown;
}
