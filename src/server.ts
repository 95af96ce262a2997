/**
 * Express server configuration.
 *
 * Assembles the read-only report viewer: request logging, the project and
 * report routes, and error handling.
 */

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { createFileProjectStore } from './storage/file-store';
import { ProjectStore } from './storage/store';
import { errorHandler, requestLogger } from './api/middleware';
import { createProjectRoutes } from './api/projects';
import { createReportRoutes } from './api/reports';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing configuration and services. */
export interface AppContext {
  config: AppConfig;
  store: ProjectStore;
}

/** Create the application context. */
export function createAppContext(config: AppConfig = loadConfig(), store?: ProjectStore): AppContext {
  return {
    config,
    store: store ?? createFileProjectStore(config.projectsRoot),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      projectsRoot: ctx.config.projectsRoot,
    });
  });

  app.use(createProjectRoutes(ctx.store));
  app.use(createReportRoutes(ctx.store.projectsRoot));

  app.use(errorHandler);

  return app;
}
