// Environment configuration loader for the sweeper

import { LogLevel } from '../types';
import { isLogLevel } from './logger';

export interface EnvironmentConfig {
  logging: {
    level: LogLevel;
    /** Directory for JSON-lines log files; file logging is off when unset */
    filePath?: string;
  };
  warnings: string[];
}

/**
 * Read LOG_LEVEL and LOG_FILE_PATH. An unknown level falls back to INFO with a warning.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const warnings: string[] = [];
  const rawLevel = (env.LOG_LEVEL || 'INFO').toUpperCase();

  let level: LogLevel = 'INFO';
  if (isLogLevel(rawLevel)) {
    level = rawLevel;
  } else {
    warnings.push(`Invalid log level "${env.LOG_LEVEL}", using INFO as default`);
  }

  return {
    logging: {
      level,
      filePath: env.LOG_FILE_PATH || undefined,
    },
    warnings,
  };
}
