#!/usr/bin/env node
/**
 * Operational commands for local development.
 *
 *   report-viewer serve                 Start the HTTP server
 *   report-viewer check [project]       Inspect a project's artifacts (default: latest project)
 *   report-viewer clear-cache           Empty the cache directory
 */

import { AppConfig, loadConfig } from './config';
import { initLogging, logger } from './logger';
import { startServer } from './index';
import { clearCache } from './tools/clear-cache';
import { formatInspection, inspectProject, latestProjectName } from './tools/inspect-project';

export const USAGE = 'Usage: report-viewer <serve|check [project]|clear-cache>';

/** Process surroundings a command runs in. */
export interface CliIo {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout(text: string): void;
  stderr(text: string): void;
}

function processIo(): CliIo {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

async function runCheck(config: AppConfig, projectArg: string | undefined, io: CliIo): Promise<number> {
  const projectName = projectArg ?? (await latestProjectName(config.projectsRoot));
  if (!projectName) {
    logger.error('No projects found', { projectsRoot: config.projectsRoot });
    return 1;
  }
  if (!projectArg) {
    logger.info('Inspecting latest project', { project: projectName });
  }

  const inspection = await inspectProject(config.projectsRoot, projectName, `http://${config.host}:${config.port}`);
  io.stdout(formatInspection(inspection));
  return inspection.exists ? 0 : 1;
}

/** Run one command and resolve to its exit code. */
export async function main(args: string[], io: CliIo = processIo()): Promise<number> {
  const command = args[0];

  switch (command) {
    case 'serve':
      startServer(loadConfig(io.env, io.cwd));
      return 0;
    case 'check': {
      const config = loadConfig(io.env, io.cwd);
      initLogging({ level: config.logLevel });
      return runCheck(config, args[1], io);
    }
    case 'clear-cache': {
      const config = loadConfig(io.env, io.cwd);
      initLogging({ level: config.logLevel });
      const result = await clearCache(config.cacheDir);
      io.stdout(`Removed ${result.removed.length} entries from ${result.cacheDir}\n`);
      return 0;
    }
    default:
      io.stderr(`${USAGE}\n`);
      return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((error: unknown) => {
      logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}
