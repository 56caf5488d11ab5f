import fastify, { type FastifyServerOptions } from 'fastify';

import { loadServerConfig, type ServerConfig } from './config.js';
import type { AssetFileSystem } from './plistAssets.js';
import { registerHealthRoutes } from './routes/health.js';
import { handleRouteError } from './routes/httpResponses.js';
import { registerPlistRoutes } from './routes/plist.js';

export type BuildAppOptions = {
  logger?: FastifyServerOptions['logger'];
  config?: ServerConfig;
  fileSystem?: AssetFileSystem;
};

export async function buildApp(opts: BuildAppOptions = {}) {
  // The environment is only read when the caller has not already done so.
  const config = opts.config ?? loadServerConfig();

  const app = fastify({ logger: opts.logger ?? { level: config.logLevel } });

  app.setErrorHandler(handleRouteError);

  await registerHealthRoutes(app, { assetRoot: config.assetRoot });
  await registerPlistRoutes(app, {
    assetRoot: config.assetRoot,
    identificationHeader: config.identificationHeader,
    fileSystem: opts.fileSystem,
  });

  return app;
}
