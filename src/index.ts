#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Why: Reads env vars, loads the route manifest, then either writes the
 * OpenAPI document once or serves it until a shutdown signal arrives.
 */

import 'dotenv/config';
import { writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig } from './config.js';
import { DocsServer } from './docs-server.js';
import { getErrorDetails } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { ManifestLoader } from './manifest-loader.js';
import { PulpSchemaGenerator } from './schema-generator.js';

const BUNDLED_MANIFEST = resolve(dirname(fileURLToPath(import.meta.url)), '../manifests/pulp-file.yaml');

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logFormat, config.logLevel);
  const manifestPath = config.docs.manifestPath ?? BUNDLED_MANIFEST;

  const manifest = await new ManifestLoader().load(manifestPath);
  logger.info('Route manifest loaded', {
    manifest: manifestPath,
    routes: manifest.registry.getRoutes().length,
  });

  const generator = new PulpSchemaGenerator({
    routes: manifest.registry,
    info: manifest.info,
    componentVersions: manifest.componentVersions,
    permissions: manifest.permissions,
    mountUrl: config.docs.mountUrl,
    pathPrefix: config.docs.pathPrefix,
    logger,
  });

  const outputPath = config.docs.outputPath;
  if (outputPath) {
    const document = generator.getSchema(undefined, config.docs.public);
    const content = /\.ya?ml$/.test(outputPath)
      ? stringifyYaml(document)
      : `${JSON.stringify(document, null, 2)}\n`;
    await writeFile(outputPath, content, 'utf-8');
    logger.info('OpenAPI document written', { output: outputPath, paths: Object.keys(document.paths).length });
    return;
  }

  const server = new DocsServer(generator, {
    host: config.docs.host,
    port: config.docs.port,
    docsPath: config.docs.path,
    public: config.docs.public,
    metricsEnabled: config.docs.metricsEnabled,
    metricsPath: config.docs.metricsPath,
  }, logger);
  await server.start();

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  // Config may be what failed, so fall back to the raw LOG_* variables
  const logger: Logger = createLogger();
  logger.error('Fatal error', error instanceof Error ? error : undefined, getErrorDetails(error));
  process.exit(1);
});
