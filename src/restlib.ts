/**
 * REST call wrapper for the Pulp management API
 *
 * Why undici: the client certificate and key have to reach the TLS layer.
 * undici's Agent takes them as connect options and its fetch accepts the
 * agent as dispatcher, so certificate auth and plain calls share one code
 * path.
 */

import { readFileSync } from 'fs';
import { Agent, fetch, type Dispatcher, type RequestInit } from 'undici';
import { ACCEPTED_STATUSES, CLIENT_DEFAULTS, HTTP_STATUS } from './constants.js';
import { TransportError } from './errors.js';
import { InterceptorChain, type RequestContext, type ResponseContext } from './interceptors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';

export type RestMethod = 'GET' | 'POST' | 'HEAD' | 'PUT' | 'DELETE';

export interface RestlibOptions {
  host: string;
  port: number;
  /** Path prefix of every call, e.g. "/pulp/api" */
  apiHandler: string;
  certFile?: string;
  keyFile?: string;
  username?: string;
  password?: string;
  locale?: string;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Overrides the dispatcher built from the certificate options */
  dispatcher?: Dispatcher;
}

export class Restlib {
  readonly headers: Readonly<Record<string, string>> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  private interceptors: InterceptorChain;
  private dispatcher?: Dispatcher;
  private ownsDispatcher = false;

  constructor(private options: RestlibOptions) {
    this.interceptors = new InterceptorChain({
      username: options.username,
      password: options.password,
      locale: options.locale,
      logger: options.logger,
      metrics: options.metrics,
    });

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
    } else if (options.certFile) {
      options.logger?.info('Using client certificate', {
        certFile: options.certFile,
        keyFile: options.keyFile,
      });
      this.dispatcher = new Agent({
        connect: {
          cert: readFileSync(options.certFile),
          key: options.keyFile ? readFileSync(options.keyFile) : undefined,
        },
      });
      this.ownsDispatcher = true;
    }
  }

  get baseUrl(): string {
    return `https://${this.options.host}:${this.options.port}`;
  }

  /**
   * Prefix the path with the API handler unless it already carries it
   *
   * ("/repositories/", handler "/pulp/api") => "/pulp/api/repositories/"
   */
  resolvePath(path: string): string {
    const handler = this.options.apiHandler || CLIENT_DEFAULTS.API_HANDLER;
    if (path.startsWith(handler)) {
      return path;
    }
    return `${handler.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  }

  /**
   * Issue one call and decode the JSON response
   *
   * Resolves to null for 404 and for empty bodies; statuses outside
   * 200/201/202/204 reject with a TransportError carrying the raw body.
   */
  async request<T = unknown>(method: RestMethod, path: string, body?: unknown): Promise<T | null> {
    const ctx: RequestContext = {
      method,
      url: `${this.baseUrl}${this.resolvePath(path)}`,
      headers: { ...this.headers },
      body,
    };

    const response = await this.interceptors.execute(ctx, () => this.send(ctx));

    if (response.status === HTTP_STATUS.NOT_FOUND) {
      return null;
    }
    if (!ACCEPTED_STATUSES.includes(response.status)) {
      throw new TransportError(response.status, response.text);
    }
    if (response.text.length === 0) {
      return null;
    }

    const decoded: T = JSON.parse(response.text);
    return decoded;
  }

  private async send(ctx: RequestContext): Promise<ResponseContext> {
    const init: RequestInit = {
      method: ctx.method,
      headers: ctx.headers,
    };

    // fetch rejects a body on GET and HEAD requests
    if (ctx.method !== 'GET' && ctx.method !== 'HEAD' && ctx.body !== undefined) {
      init.body = JSON.stringify(ctx.body);
    }
    if (this.dispatcher) {
      init.dispatcher = this.dispatcher;
    }

    const response = await fetch(ctx.url, init);
    const text = await response.text();

    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      text,
    };
  }

  requestGet<T = unknown>(path: string): Promise<T | null> {
    return this.request<T>('GET', path);
  }

  requestPost<T = unknown>(path: string, body?: unknown): Promise<T | null> {
    return this.request<T>('POST', path, body);
  }

  requestHead<T = unknown>(path: string): Promise<T | null> {
    return this.request<T>('HEAD', path);
  }

  requestPut<T = unknown>(path: string, body?: unknown): Promise<T | null> {
    return this.request<T>('PUT', path, body);
  }

  requestDelete<T = unknown>(path: string): Promise<T | null> {
    return this.request<T>('DELETE', path);
  }

  /**
   * Release the certificate agent; injected dispatchers belong to the caller
   */
  async close(): Promise<void> {
    if (this.dispatcher && this.ownsDispatcher) {
      await this.dispatcher.close();
    }
    this.dispatcher = undefined;
  }
}
