/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.load
 *   - config.get
 *
 * Reads defaults for polling and downloads from the environment.
 */

import * as core from '@actions/core';
import type { ConsoleUtilsConfig } from './types';
import { DOWNLOAD_TIMEOUT_MS, POLL_INTERVAL_SECONDS, POLL_TIMEOUT_SECONDS } from './types';
import { parseBooleanFlag, parseNonNegativeNumber } from './utils';

export const ENV_POLL_INTERVAL = 'STAGE_CONSOLE_POLL_INTERVAL';
export const ENV_POLL_TIMEOUT = 'STAGE_CONSOLE_POLL_TIMEOUT';
export const ENV_DOWNLOAD_TIMEOUT_MS = 'STAGE_CONSOLE_DOWNLOAD_TIMEOUT_MS';
export const ENV_DIAGNOSTICS = 'STAGE_CONSOLE_DIAGNOSTICS';

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined) return fallback;

  const value = parseNonNegativeNumber(raw);
  if (value === undefined) {
    core.warning(`Ignoring ${name}=${raw}: expected a non-negative number. Using ${fallback}.`);
    return fallback;
  }
  return value;
}

// -----------------------------------------------------------------------------
// Port: config.load
// -----------------------------------------------------------------------------

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConsoleUtilsConfig {
  return {
    poll_interval_seconds: readNumber(env, ENV_POLL_INTERVAL, POLL_INTERVAL_SECONDS),
    poll_timeout_seconds: readNumber(env, ENV_POLL_TIMEOUT, POLL_TIMEOUT_SECONDS),
    download_timeout_ms: readNumber(env, ENV_DOWNLOAD_TIMEOUT_MS, DOWNLOAD_TIMEOUT_MS),
    diagnostics: parseBooleanFlag(env[ENV_DIAGNOSTICS]),
  };
}

// -----------------------------------------------------------------------------
// Port: config.get
// -----------------------------------------------------------------------------

let cached: ConsoleUtilsConfig | undefined;

/**
 * Config from process.env, read once and reused for every default.
 */
export function getConfig(): ConsoleUtilsConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Drops the cached config so the next getConfig() reads the environment again.
 */
export function resetConfig(): void {
  cached = undefined;
}
