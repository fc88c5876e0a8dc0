import type { LogLevel } from 'loglayer';

import { isValidLogLevel } from './log.ts';

/**
 * Environment configuration read by `MentionClient.fromEnvironment` and the CLI
 */
export interface EnvironmentConfig {
  MENTION_ACCESS_TOKEN?: string;
  MENTION_BASE_URL?: string;
  /** Offset `yyyy-MM-dd HH:mm` dates are interpreted in, e.g. `+02:00` */
  MENTION_UTC_OFFSET?: string;
  LOG_LEVEL?: LogLevel;
}

/**
 * Load configuration from environment variables. Unset and empty variables
 * are left out; an unknown LOG_LEVEL is ignored.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const config: EnvironmentConfig = {};

  if (env['MENTION_ACCESS_TOKEN']) config.MENTION_ACCESS_TOKEN = env['MENTION_ACCESS_TOKEN'];
  if (env['MENTION_BASE_URL']) config.MENTION_BASE_URL = env['MENTION_BASE_URL'];
  if (env['MENTION_UTC_OFFSET']) config.MENTION_UTC_OFFSET = env['MENTION_UTC_OFFSET'];

  const logLevel = env['LOG_LEVEL'];
  if (logLevel && isValidLogLevel(logLevel)) {
    config.LOG_LEVEL = logLevel;
  }

  return config;
}
