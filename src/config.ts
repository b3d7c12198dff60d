/**
 * Environment configuration
 *
 * Why zod: every variable is parsed and defaulted in one place, and a bad
 * value stops startup with the variable name instead of failing later.
 */

import { z } from 'zod';
import { CLIENT_DEFAULTS } from './constants.js';
import { ConfigurationError } from './errors.js';
import { LogLevel, levelFromEnv } from './logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const port = z.coerce.number().int().min(0).max(65535);

const optionalString = z.string().min(1).optional();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),

  PULP_ROUTES_MANIFEST: optionalString,
  PULP_DOCS_HOST: z.string().min(1).default('127.0.0.1'),
  PULP_DOCS_PORT: port.default(24817),
  PULP_DOCS_PATH: z.string().startsWith('/').default('/pulp/api/v3/docs/'),
  PULP_DOCS_PUBLIC: booleanFlag.default('false'),
  PULP_SCHEMA_MOUNT_URL: optionalString,
  PULP_SCHEMA_PATH_PREFIX: optionalString,
  PULP_DOCS_OUTPUT: optionalString,
  METRICS_ENABLED: booleanFlag.default('false'),
  METRICS_PATH: z.string().startsWith('/').default('/metrics'),

  PULP_HOST: z.string().min(1).default(CLIENT_DEFAULTS.HOST),
  PULP_PORT: port.default(CLIENT_DEFAULTS.PORT),
  PULP_API_HANDLER: z.string().startsWith('/').default(CLIENT_DEFAULTS.API_HANDLER),
  PULP_USERNAME: optionalString,
  PULP_PASSWORD: optionalString,
  PULP_CERT_FILE: optionalString,
  PULP_KEY_FILE: optionalString,
});

export interface AppConfig {
  logLevel: LogLevel;
  logFormat: 'console' | 'json';
  docs: {
    manifestPath?: string;
    host: string;
    port: number;
    path: string;
    public: boolean;
    mountUrl?: string;
    pathPrefix?: string;
    outputPath?: string;
    metricsEnabled: boolean;
    metricsPath: string;
  };
  client: {
    host: string;
    port: number;
    handler: string;
    username?: string;
    password?: string;
    certFile?: string;
    keyFile?: string;
  };
}

/**
 * Parse configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const values = result.data;
  return {
    logLevel: levelFromEnv(values.LOG_LEVEL ?? 'INFO'),
    logFormat: values.LOG_FORMAT,
    docs: {
      manifestPath: values.PULP_ROUTES_MANIFEST,
      host: values.PULP_DOCS_HOST,
      port: values.PULP_DOCS_PORT,
      path: values.PULP_DOCS_PATH,
      public: values.PULP_DOCS_PUBLIC,
      mountUrl: values.PULP_SCHEMA_MOUNT_URL,
      pathPrefix: values.PULP_SCHEMA_PATH_PREFIX,
      outputPath: values.PULP_DOCS_OUTPUT,
      metricsEnabled: values.METRICS_ENABLED,
      metricsPath: values.METRICS_PATH,
    },
    client: {
      host: values.PULP_HOST,
      port: values.PULP_PORT,
      handler: values.PULP_API_HANDLER,
      username: values.PULP_USERNAME,
      password: values.PULP_PASSWORD,
      certFile: values.PULP_CERT_FILE,
      keyFile: values.PULP_KEY_FILE,
    },
  };
}
