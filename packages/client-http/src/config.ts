import { isLogLevel } from '@repoctl/core';

import { DEFAULT_REQUEST_TIMEOUT_MS } from '#constants/defaults';
import { MS_PER_SECOND } from '#constants/time';

import type { LogLevel } from '@repoctl/core';

/** environment variable holding the request timeout in whole seconds */
export const REQUEST_TIMEOUT_ENV = 'REPOCTL_HTTP_TIMEOUT';

/** environment variable holding the minimum log level */
export const LOG_LEVEL_ENV = 'REPOCTL_LOG_LEVEL';

/** level used when the environment does not name one */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/** optionally signed decimal integer */
const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * resolves the per-request timeout from the environment
 *
 * malformed or non-positive values fall back to the default
 * @param env environment variables
 * @returns timeout in milliseconds
 */
export function resolveRequestTimeout(
  env: NodeJS.ProcessEnv = process.env,
): number {
  const value = env[REQUEST_TIMEOUT_ENV]?.trim();

  if (!value || !INTEGER_REGEX.test(value)) {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }

  const seconds = Number.parseInt(value, 10);

  return seconds > 0 ? seconds * MS_PER_SECOND : DEFAULT_REQUEST_TIMEOUT_MS;
}

/**
 * resolves the minimum log level from the environment
 * @param env environment variables
 * @returns named level, or the default when unset or unknown
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const value = env[LOG_LEVEL_ENV]?.trim().toLowerCase();

  return value && isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}
