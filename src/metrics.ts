/**
 * Prometheus Metrics Collector
 *
 * Why: Observability for the documentation endpoint and the REST client
 *
 * Tracks:
 * - HTTP requests served (status, method, path)
 * - Document generations (public, bindings, duration)
 * - API calls to the Pulp server (method, status class, duration, errors)
 */

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export interface GenerationLabels {
  public: boolean;
  bindings: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  // HTTP metrics
  private httpRequestsTotal: Counter;
  private httpRequestDuration: Histogram;

  // Document generation metrics
  private generationsTotal: Counter;
  private generationDuration: Histogram;

  // API metrics (calls to the Pulp server)
  private apiCallsTotal: Counter;
  private apiCallDuration: Histogram;
  private apiCallErrors: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'pulp_';

    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.generationsTotal = new Counter({
      name: `${prefix}schema_generations_total`,
      help: 'Total number of generated OpenAPI documents',
      labelNames: ['public', 'bindings'],
      registers: [this.registry],
    });

    this.generationDuration = new Histogram({
      name: `${prefix}schema_generation_duration_seconds`,
      help: 'OpenAPI document generation duration in seconds',
      labelNames: ['public', 'bindings'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [this.registry],
    });

    this.apiCallsTotal = new Counter({
      name: `${prefix}api_calls_total`,
      help: 'Total number of API calls to the Pulp server',
      labelNames: ['method', 'status'],
      registers: [this.registry],
    });

    this.apiCallDuration = new Histogram({
      name: `${prefix}api_call_duration_seconds`,
      help: 'API call duration in seconds',
      labelNames: ['method', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.apiCallErrors = new Counter({
      name: `${prefix}api_call_errors_total`,
      help: 'Total number of failed API calls',
      labelNames: ['method', 'error_type'],
      registers: [this.registry],
    });
  }

  /**
   * Record HTTP request
   */
  recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = {
      method,
      path: this.normalizePath(path),
      status: status.toString(),
    };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  /**
   * Record one generated document
   */
  recordGeneration(labels: GenerationLabels, durationSeconds: number): void {
    if (!this.enabled) return;

    const values = { public: String(labels.public), bindings: String(labels.bindings) };
    this.generationsTotal.inc(values);
    this.generationDuration.observe(values, durationSeconds);
  }

  /**
   * Record API call to the Pulp server
   */
  recordApiCall(method: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const statusLabel = this.getStatusLabel(status);
    this.apiCallsTotal.inc({ method, status: statusLabel });
    this.apiCallDuration.observe({ method, status: statusLabel }, durationSeconds);
  }

  /**
   * Record API call error
   */
  recordApiCallError(method: string, errorType: string): void {
    if (!this.enabled) return;
    this.apiCallErrors.inc({ method, error_type: errorType });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Strip the query string
   *
   * Why: `?plugin=...` and `?bindings` would multiply the label values
   */
  private normalizePath(path: string): string {
    return path.split('?')[0];
  }

  /**
   * Get status label (2xx, 4xx, 5xx)
   */
  private getStatusLabel(status: number): string {
    if (status >= 200 && status < 300) return '2xx';
    if (status >= 300 && status < 400) return '3xx';
    if (status >= 400 && status < 500) return '4xx';
    if (status >= 500 && status < 600) return '5xx';
    return 'unknown';
  }
}
