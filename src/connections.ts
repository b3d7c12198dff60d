/**
 * Resource connections of the legacy Pulp management API
 *
 * Each class maps one resource family onto its REST paths. Methods are thin:
 * one call per operation, except the item lookups that also fetch the
 * deferred fields the server leaves out of the item body.
 */

import { existsSync } from 'fs';
import type { Dispatcher } from 'undici';
import type { AppConfig } from './config.js';
import { CLIENT_DEFAULTS } from './constants.js';
import { Restlib } from './restlib.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type {
  CertData,
  Consumer,
  ConsumerGroup,
  Erratum,
  Package,
  PackageGroupType,
  Repository,
  RepositoryInput,
  User,
} from './types/pulp.js';

const REPOSITORY_DEFERRED_FIELDS = ['packages', 'packagegroups', 'packagegroupcategories'] as const;

export interface ConnectionOptions {
  host?: string;
  port?: number;
  handler?: string;
  certFile?: string;
  keyFile?: string;
  username?: string;
  password?: string;
  locale?: string;
  logger?: Logger;
  metrics?: MetricsCollector;
  dispatcher?: Dispatcher;
}

/**
 * The path when the file exists, otherwise undefined
 */
export function existingPath(path: string): string | undefined {
  return existsSync(path) ? path : undefined;
}

/**
 * Connection options from the `PULP_*` client settings
 */
export function connectionOptionsFromConfig(
  client: AppConfig['client'],
  extra: Pick<ConnectionOptions, 'locale' | 'logger' | 'metrics' | 'dispatcher'> = {}
): ConnectionOptions {
  return {
    host: client.host,
    port: client.port,
    handler: client.handler,
    username: client.username,
    password: client.password,
    certFile: client.certFile,
    keyFile: client.keyFile,
    ...extra,
  };
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

export class PulpConnection {
  readonly host: string;
  readonly port: number;
  readonly handler: string;
  readonly certFile?: string;
  readonly keyFile?: string;
  readonly username?: string;
  readonly password?: string;

  protected conn: Restlib;

  constructor(protected options: ConnectionOptions = {}) {
    this.host = options.host ?? CLIENT_DEFAULTS.HOST;
    this.port = options.port ?? CLIENT_DEFAULTS.PORT;
    this.handler = options.handler ?? CLIENT_DEFAULTS.API_HANDLER;
    this.certFile = options.certFile ?? existingPath(CLIENT_DEFAULTS.CERT_PATH);
    this.keyFile = options.keyFile ?? existingPath(CLIENT_DEFAULTS.KEY_PATH);
    this.username = options.username;
    this.password = options.password;
    this.conn = this.setUp();
  }

  /**
   * (Re)create the underlying REST wrapper
   */
  setUp(): Restlib {
    const conn = new Restlib({
      host: this.host,
      port: this.port,
      apiHandler: this.handler,
      certFile: this.certFile,
      keyFile: this.keyFile,
      username: this.username,
      password: this.password,
      locale: this.options.locale,
      logger: this.options.logger,
      metrics: this.options.metrics,
      dispatcher: this.options.dispatcher,
    });
    this.conn = conn;

    this.options.logger?.info('Connection established', {
      host: this.host,
      port: this.port,
      handler: this.handler,
      certFile: this.certFile,
      keyFile: this.keyFile,
    });
    return conn;
  }

  async shutDown(): Promise<void> {
    await this.conn.close();
    this.options.logger?.info('Remote connection closed');
  }
}

export class RepoConnection extends PulpConnection {
  create(input: RepositoryInput): Promise<Repository | null> {
    return this.conn.requestPut<Repository>('/repositories/', {
      id: input.id,
      name: input.name,
      arch: input.arch,
      feed: input.feed ?? null,
      use_symlinks: input.symlinks ?? false,
      sync_schedule: input.syncSchedule ?? null,
      cert_data: input.certData ?? null,
    });
  }

  async repository(id: string): Promise<Repository | null> {
    const path = `/repositories/${segment(id)}/`;
    const repo = await this.conn.requestGet<Repository>(path);
    if (repo === null) {
      return null;
    }
    for (const field of REPOSITORY_DEFERRED_FIELDS) {
      repo[field] = await this.conn.requestGet(`${path}${field}/`);
    }
    return repo;
  }

  repositories(): Promise<Repository[] | null> {
    return this.conn.requestGet<Repository[]>('/repositories/');
  }

  update(repo: Repository): Promise<Repository | null> {
    return this.conn.requestPut<Repository>(`/repositories/${segment(repo.id)}/`, repo);
  }

  delete(id: string): Promise<unknown> {
    return this.conn.requestDelete(`/repositories/${segment(id)}/`);
  }

  clean(): Promise<unknown> {
    return this.conn.requestDelete('/repositories/');
  }

  /**
   * Start a sync; the server answers with the task status
   */
  sync(repoId: string, timeout?: number): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/sync/`, { timeout: timeout ?? null });
  }

  addPackage(repoId: string, packageId: string): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/add_package/`, {
      repoid: repoId,
      packageid: packageId,
    });
  }

  getPackage(repoId: string, packageName: string): Promise<Package | null> {
    return this.conn.requestPost<Package>(`/repositories/${segment(repoId)}/get_package/`, packageName);
  }

  packages(repoId: string): Promise<Package[] | null> {
    return this.conn.requestGet<Package[]>(`/repositories/${segment(repoId)}/packages/`);
  }

  packageGroups(repoId: string): Promise<unknown> {
    return this.conn.requestGet(`/repositories/${segment(repoId)}/packagegroups/`);
  }

  createPackageGroup(repoId: string, groupId: string, groupName: string, description: string): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/create_packagegroup/`, {
      groupid: groupId,
      groupname: groupName,
      description,
    });
  }

  deletePackageGroup(repoId: string, groupId: string): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/delete_packagegroup/`, { groupid: groupId });
  }

  addPackageToGroup(repoId: string, groupId: string, packageName: string, type: PackageGroupType): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/add_package_to_group/`, {
      groupid: groupId,
      name: packageName,
      type,
    });
  }

  deletePackageFromGroup(
    repoId: string,
    groupId: string,
    packageName: string,
    type: PackageGroupType
  ): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/delete_package_from_group/`, {
      groupid: groupId,
      name: packageName,
      type,
    });
  }

  upload(repoId: string, packageInfo: Record<string, unknown>, packageStream: string): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/upload/`, {
      repo: repoId,
      pkginfo: packageInfo,
      pkgstream: packageStream,
    });
  }

  allSchedules(): Promise<Record<string, string> | null> {
    return this.conn.requestGet<Record<string, string>>('/repositories/schedules/');
  }

  /**
   * Poll a sync task; `statusPath` is the path the sync call returned
   */
  syncStatus(statusPath: string): Promise<unknown> {
    return this.conn.requestGet(statusPath);
  }

  addErrata(repoId: string, errataIds: string[]): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/add_errata/`, {
      repoid: repoId,
      errataid: errataIds,
    });
  }

  deleteErrata(repoId: string, errataIds: string[]): Promise<unknown> {
    return this.conn.requestPost(`/repositories/${segment(repoId)}/delete_errata/`, {
      repoid: repoId,
      errataid: errataIds,
    });
  }

  errata(repoId: string, types: string[] = []): Promise<Erratum[] | null> {
    return this.conn.requestPost<Erratum[]>(`/repositories/${segment(repoId)}/list_errata/`, {
      repoid: repoId,
      types,
    });
  }
}

export class ConsumerConnection extends PulpConnection {
  create(id: string, description: string): Promise<Consumer | null> {
    return this.conn.requestPut<Consumer>('/consumers/', { id, description });
  }

  update(consumer: Consumer): Promise<Consumer | null> {
    return this.conn.requestPut<Consumer>(`/consumers/${segment(consumer.id)}/`, consumer);
  }

  bulkCreate(consumers: Consumer[]): Promise<unknown> {
    return this.conn.requestPost('/consumers/bulk/', consumers);
  }

  delete(id: string): Promise<unknown> {
    return this.conn.requestDelete(`/consumers/${segment(id)}/`);
  }

  clean(): Promise<unknown> {
    return this.conn.requestDelete('/consumers/');
  }

  async consumer(id: string): Promise<Consumer | null> {
    const path = `/consumers/${segment(id)}/`;
    const consumer = await this.conn.requestGet<Consumer>(path);
    if (consumer === null) {
      return null;
    }
    consumer.package_profile = await this.conn.requestGet(`${path}package_profile/`);
    const repoIds = await this.conn.requestGet<string[]>(`${path}repoids/`);
    consumer.repoids = repoIds ?? [];
    return consumer;
  }

  packages(id: string): Promise<Package[] | null> {
    return this.conn.requestGet<Package[]>(`/consumers/${segment(id)}/packages/`);
  }

  certificate(id: string): Promise<CertData | null> {
    return this.conn.requestGet<CertData>(`/consumers/${segment(id)}/certificate/`);
  }

  consumers(): Promise<Consumer[] | null> {
    return this.conn.requestGet<Consumer[]>('/consumers/');
  }

  consumersWithPackageName(name: string): Promise<Consumer[] | null> {
    return this.conn.requestGet<Consumer[]>(`/consumers/?package_name=${encodeURIComponent(name)}`);
  }

  bind(id: string, repoId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/bind/`, repoId);
  }

  unbind(id: string, repoId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/unbind/`, repoId);
  }

  profile(id: string, profile: unknown): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/profile/`, profile);
  }

  installPackages(id: string, packageNames: string[]): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/installpackages/`, { packagenames: packageNames });
  }

  installPackageGroups(id: string, packageIds: string[]): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/installpackagegroups/`, { packageids: packageIds });
  }

  errata(id: string, types?: string[]): Promise<Erratum[] | null> {
    return this.conn.requestPost<Erratum[]>(`/consumers/${segment(id)}/listerrata/`, { types: types ?? null });
  }

  installErrata(id: string, errataIds: string[], types: string[] = []): Promise<unknown> {
    return this.conn.requestPost(`/consumers/${segment(id)}/installerrata/`, {
      consumerid: id,
      errataids: errataIds,
      types,
    });
  }
}

export class ConsumerGroupConnection extends PulpConnection {
  create(id: string, description: string, consumerIds: string[] = []): Promise<ConsumerGroup | null> {
    return this.conn.requestPut<ConsumerGroup>('/consumergroups/', {
      id,
      description,
      consumerids: consumerIds,
    });
  }

  update(group: ConsumerGroup): Promise<ConsumerGroup | null> {
    return this.conn.requestPut<ConsumerGroup>(`/consumergroups/${segment(group.id)}/`, group);
  }

  delete(id: string): Promise<unknown> {
    return this.conn.requestDelete(`/consumergroups/${segment(id)}/`);
  }

  clean(): Promise<unknown> {
    return this.conn.requestDelete('/consumergroups/');
  }

  consumerGroups(): Promise<ConsumerGroup[] | null> {
    return this.conn.requestGet<ConsumerGroup[]>('/consumergroups/');
  }

  consumerGroup(id: string): Promise<ConsumerGroup | null> {
    return this.conn.requestGet<ConsumerGroup>(`/consumergroups/${segment(id)}/`);
  }

  addConsumer(id: string, consumerId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/add_consumer/`, consumerId);
  }

  deleteConsumer(id: string, consumerId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/delete_consumer/`, consumerId);
  }

  bind(id: string, repoId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/bind/`, repoId);
  }

  unbind(id: string, repoId: string): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/unbind/`, repoId);
  }

  installPackages(id: string, packageNames: string[]): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/installpackages/`, { packagenames: packageNames });
  }

  installErrata(id: string, errataIds: string[], types: string[] = []): Promise<unknown> {
    return this.conn.requestPost(`/consumergroups/${segment(id)}/installerrata/`, {
      consumerid: id,
      errataids: errataIds,
      types,
    });
  }
}

export class PackageConnection extends PulpConnection {
  clean(): Promise<unknown> {
    return this.conn.requestDelete('/packages/');
  }

  create(pkg: Package): Promise<Package | null> {
    return this.conn.requestPut<Package>('/packages/', {
      name: pkg.name,
      epoch: pkg.epoch,
      version: pkg.version,
      release: pkg.release,
      arch: pkg.arch,
      description: pkg.description,
      checksum_type: pkg.checksum_type,
      checksum: pkg.checksum,
      filename: pkg.filename,
    });
  }

  packages(): Promise<Package[] | null> {
    return this.conn.requestGet<Package[]>('/packages/');
  }

  package(id: string): Promise<Package | null> {
    return this.conn.requestGet<Package>(`/packages/${segment(id)}/`);
  }

  delete(id: string): Promise<unknown> {
    return this.conn.requestDelete(`/packages/${segment(id)}/`);
  }

  packageByNevra(name: string, version: string, release: string, epoch: string, arch: string): Promise<Package | null> {
    const parts = [name, version, release, epoch, arch].map(segment).join('/');
    return this.conn.requestGet<Package>(`/packages/${parts}/`);
  }
}

export class UserConnection extends PulpConnection {
  create(login: string, password?: string, name?: string): Promise<User | null> {
    return this.conn.requestPut<User>('/users/', {
      login,
      password: password ?? null,
      name: name ?? null,
    });
  }

  /**
   * Users are addressed by `id` on update and by login everywhere else
   */
  update(user: User & { id: string }): Promise<User | null> {
    return this.conn.requestPut<User>(`/users/${segment(user.id)}/`, user);
  }

  delete(login: string): Promise<unknown> {
    return this.conn.requestDelete(`/users/${segment(login)}/`);
  }

  clean(): Promise<unknown> {
    return this.conn.requestDelete('/users/');
  }

  users(): Promise<User[] | null> {
    return this.conn.requestGet<User[]>('/users/');
  }

  user(login: string): Promise<User | null> {
    return this.conn.requestGet<User>(`/users/${segment(login)}/`);
  }
}

export class ErrataConnection extends PulpConnection {
  create(erratum: Erratum): Promise<Erratum | null> {
    return this.conn.requestPut<Erratum>('/errata/', erratum);
  }

  erratum(id: string): Promise<Erratum | null> {
    return this.conn.requestGet<Erratum>(`/errata/${segment(id)}/`);
  }

  errata(): Promise<Erratum[] | null> {
    return this.conn.requestGet<Erratum[]>('/errata/');
  }

  delete(id: string): Promise<unknown> {
    return this.conn.requestDelete(`/errata/${segment(id)}/`);
  }

  clean(): Promise<unknown> {
    return this.conn.requestDelete('/errata/');
  }
}
