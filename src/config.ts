/**
 * Runtime configuration, read from environment variables.
 */

import path from 'path';
import { configError, TypedErrorException } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export interface AppConfig {
  host: string;
  port: number;
  /** Absolute path of the directory holding one sub-directory per project. */
  projectsRoot: string;
  /** Absolute path of the scratch cache directory cleared by `clear-cache`. */
  cacheDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 5001;

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new TypedErrorException(configError(`Invalid port: ${raw}`, { port: raw }));
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Build the configuration from an environment. Relative directories are
 * resolved against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const rawPort = nonEmpty(env.REPORT_VIEWER_PORT) ?? nonEmpty(env.PORT);
  const rawLevel = nonEmpty(env.REPORT_VIEWER_LOG_LEVEL);

  let logLevel = LogLevel.Info;
  if (rawLevel !== undefined) {
    const parsed = parseLogLevel(rawLevel);
    if (!parsed) {
      throw new TypedErrorException(configError(`Invalid log level: ${rawLevel}`, { logLevel: rawLevel }));
    }
    logLevel = parsed;
  }

  return {
    host: nonEmpty(env.REPORT_VIEWER_HOST) ?? DEFAULT_HOST,
    port: rawPort !== undefined ? parsePort(rawPort) : DEFAULT_PORT,
    projectsRoot: path.resolve(cwd, nonEmpty(env.REPORT_VIEWER_PROJECTS_DIR) ?? './projects'),
    cacheDir: path.resolve(cwd, nonEmpty(env.REPORT_VIEWER_CACHE_DIR) ?? './cache'),
    logLevel,
  };
}
