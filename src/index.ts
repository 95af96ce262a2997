/**
 * Report Viewer — serves generated research-report artifacts.
 *
 * Entry point for the HTTP server, plus the public exports for embedding
 * the app or the path resolver elsewhere.
 */

import { Server } from 'http';
import { AppConfig, loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { initLogging, logger } from './logger';

/** Initialize logging from the configuration, then start listening. */
export function startServer(config: AppConfig = loadConfig()): Server {
  initLogging({ level: config.logLevel });

  const app = createApp(createAppContext(config));
  return app.listen(config.port, config.host, () => {
    logger.info('Report viewer listening', {
      url: `http://${config.host}:${config.port}`,
      projectsRoot: config.projectsRoot,
    });
  });
}

if (require.main === module) {
  startServer();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export { loadConfig } from './config';
export * from './domain';
export * from './resolver';
export * from './storage';
export * from './tools';
export * from './logger';
