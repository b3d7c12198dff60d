/**
 * HTTP interceptors for the Pulp REST client
 *
 * Why interceptor pattern: Separates cross-cutting concerns (auth, language
 * negotiation, logging, metrics) from the one-call-per-operation methods of
 * the connection classes. Each interceptor is independently testable.
 */

import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';

export interface RequestContext {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export interface ResponseContext {
  status: number;
  headers: Record<string, string>;
  /** Raw response body; decoding is left to the caller */
  text: string;
}

export type InterceptorFn = (
  ctx: RequestContext,
  next: () => Promise<ResponseContext>
) => Promise<ResponseContext>;

export interface InterceptorConfig {
  username?: string;
  password?: string;
  /** Accept-Language value; the runtime locale when omitted */
  locale?: string;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Runtime locale as a language tag ("en_US.UTF-8" => "en-us")
 */
export function defaultLocale(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.LC_ALL || env.LC_MESSAGES || env.LANG;
  const raw = fromEnv && fromEnv !== 'C' && fromEnv !== 'POSIX'
    ? fromEnv.split('.')[0]
    : Intl.DateTimeFormat().resolvedOptions().locale;
  return raw.toLowerCase().replace(/_/g, '-');
}

export class InterceptorChain {
  private interceptors: InterceptorFn[] = [];

  constructor(public config: InterceptorConfig = {}) {
    this.buildChain();
  }

  private buildChain(): void {
    if (this.config.metrics) {
      this.interceptors.push(this.createMetricsInterceptor(this.config.metrics));
    }

    if (this.config.username !== undefined) {
      this.interceptors.push(this.createAuthInterceptor(this.config.username, this.config.password));
    }

    this.interceptors.push(this.createLanguageInterceptor(this.config.locale ?? defaultLocale()));

    if (this.config.logger) {
      this.interceptors.push(this.createLoggingInterceptor(this.config.logger));
    }
  }

  /**
   * Basic auth from the configured credentials
   *
   * A missing password is sent as an empty one.
   */
  private createAuthInterceptor(username: string, password = ''): InterceptorFn {
    const encoded = Buffer.from(`${username}:${password}`).toString('base64');

    return async (ctx, next) => {
      ctx.headers['Authorization'] = `Basic ${encoded}`;
      return next();
    };
  }

  private createLanguageInterceptor(locale: string): InterceptorFn {
    return async (ctx, next) => {
      ctx.headers['Accept-Language'] = locale;
      return next();
    };
  }

  /**
   * Debug log of every call; credentials are redacted by the logger
   */
  private createLoggingInterceptor(logger: Logger): InterceptorFn {
    return async (ctx, next) => {
      logger.debug('Pulp API request', {
        method: ctx.method,
        url: ctx.url,
        headers: ctx.headers,
        body: ctx.body,
      });

      const response = await next();

      logger.debug('Pulp API response', {
        method: ctx.method,
        url: ctx.url,
        status: response.status,
      });
      return response;
    };
  }

  /**
   * Outermost interceptor, so the duration covers the whole chain
   */
  private createMetricsInterceptor(metrics: MetricsCollector): InterceptorFn {
    return async (ctx, next) => {
      const startTime = Date.now();
      try {
        const response = await next();
        metrics.recordApiCall(ctx.method, response.status, (Date.now() - startTime) / 1000);
        return response;
      } catch (error) {
        metrics.recordApiCallError(ctx.method, error instanceof Error ? error.name : 'UnknownError');
        throw error;
      }
    };
  }

  async execute(ctx: RequestContext, finalHandler: () => Promise<ResponseContext>): Promise<ResponseContext> {
    let index = 0;

    const next = async (): Promise<ResponseContext> => {
      if (index >= this.interceptors.length) {
        return finalHandler();
      }

      const interceptor = this.interceptors[index++];
      return interceptor(ctx, next);
    };

    return next();
  }
}
