/**
 * HTTP endpoint serving the generated OpenAPI document
 *
 * Why generate per request: the document depends on query parameters
 * (`plugin`, `bindings`, `include_html`), on the caller's permissions and on
 * the host the caller used, which ends up in `servers`.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { stringify as stringifyYaml } from 'yaml';
import type { Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import type { PulpSchemaGenerator } from './schema-generator.js';
import type { DocumentRequest } from './types/introspection.js';
import type { PulpDocument } from './types/openapi.js';

export interface DocsServerConfig {
  host: string;
  port: number;
  /** Mount point of api.json / api.yaml, e.g. "/pulp/api/v3/docs/" */
  docsPath: string;
  /** Skip per-view permission checks */
  public: boolean;
  metricsEnabled: boolean;
  metricsPath: string;
}

/**
 * Resolves the permissions of the caller, e.g. from an upstream auth proxy
 */
export type PermissionResolver = (req: Request) => ReadonlySet<string> | undefined;

export interface DocsServerOptions {
  resolvePermissions?: PermissionResolver;
  metrics?: MetricsCollector;
}

export class DocsServer {
  private app: express.Application;
  private server: Server | null = null;
  private metrics: MetricsCollector | null = null;
  private readonly docsPath: string;

  constructor(
    private generator: PulpSchemaGenerator,
    private config: DocsServerConfig,
    private logger: Logger,
    private options: DocsServerOptions = {}
  ) {
    this.docsPath = config.docsPath.endsWith('/') ? config.docsPath : `${config.docsPath}/`;

    if (config.metricsEnabled) {
      this.metrics = options.metrics ?? new MetricsCollector({ enabled: true });
    }

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    // Metrics: one sample per finished response, the scrape endpoint excluded
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const metrics = this.metrics;
      if (metrics && req.path !== this.config.metricsPath) {
        const startTime = Date.now();
        res.on('finish', () => {
          metrics.recordHttpRequest(req.method, req.path, res.statusCode, (Date.now() - startTime) / 1000);
        });
      }
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get(`${this.docsPath}api.json`, (req: Request, res: Response) => {
      res.json(this.generate(req));
    });

    this.app.get(`${this.docsPath}api.yaml`, (req: Request, res: Response) => {
      res.type('application/yaml').send(stringifyYaml(this.generate(req)));
    });

    if (this.config.metricsEnabled) {
      this.app.get(this.config.metricsPath, this.handleMetrics.bind(this));
    }

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    this.app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('Documentation request failed', error, { method: req.method, path: req.path });
      res.status(500).json({ error: 'Internal Server Error', message: error.message });
    });
  }

  /**
   * Handle metrics endpoint
   *
   * Why: Prometheus scraping endpoint
   */
  private async handleMetrics(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!this.metrics) {
        res.status(404).json({ error: 'Not Found', message: 'Metrics disabled' });
        return;
      }
      const body = await this.metrics.getMetrics();
      res.set('Content-Type', this.metrics.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  }

  private generate(req: Request): PulpDocument {
    const documentRequest = this.toDocumentRequest(req);
    const labels = { public: this.config.public, bindings: documentRequest.query.has('bindings') };

    const startTime = Date.now();
    const document = this.generator.getSchema(documentRequest, this.config.public);
    const duration = (Date.now() - startTime) / 1000;

    this.metrics?.recordGeneration(labels, duration);
    this.logger.debug('Generated OpenAPI document', {
      paths: Object.keys(document.paths).length,
      durationSeconds: duration,
      ...labels,
    });

    return document;
  }

  private toDocumentRequest(req: Request): DocumentRequest {
    const queryIndex = req.originalUrl.indexOf('?');
    const query = new URLSearchParams(queryIndex === -1 ? '' : req.originalUrl.slice(queryIndex + 1));

    return {
      query,
      buildAbsoluteUri: (path: string) => `${req.protocol}://${req.get('host') ?? 'localhost'}${path}`,
      permissions: this.options.resolvePermissions?.(req),
    };
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info('Documentation server started', {
          host: this.config.host,
          port: this.config.port,
          docs: `${this.docsPath}api.json`,
          metrics: this.config.metricsEnabled,
        });
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close(err => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        this.logger.info('Documentation server stopped');
        resolve();
      });
    });
  }
}
