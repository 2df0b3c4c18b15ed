/**
 * Boundary types for stage-console-utils
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// RepeatOutcome
// Terminal result of a RepeatFunction lifecycle
// -----------------------------------------------------------------------------

export interface RepeatFinished<R> {
  status: 'finished';
  /** Result accepted by the evaluator */
  value: R;
  /** Number of times the polled function ran */
  attempts: number;
}

export interface RepeatTimedOut {
  status: 'timed_out';
  attempts: number;
}

export interface RepeatStopped {
  status: 'stopped';
  attempts: number;
}

export type RepeatOutcome<R> = RepeatFinished<R> | RepeatTimedOut | RepeatStopped;

export type RepeatState = 'idle' | 'running' | 'finished' | 'timed_out' | 'stopped' | 'failed';

// -----------------------------------------------------------------------------
// Process commands
// A platform's way of listing and killing processes by image name
// -----------------------------------------------------------------------------

export interface CommandSpec {
  file: string;
  args: string[];
}

export interface ProcessCommands {
  list: (taskName: string) => CommandSpec;
  kill: (taskName: string) => CommandSpec;
  /** True if the list command's output shows the task */
  isListed: (output: string, taskName: string) => boolean;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface ConsoleUtilsConfig {
  /** Default delay between poll cycles, in seconds */
  poll_interval_seconds: number;
  /** Default poll timeout, in seconds */
  poll_timeout_seconds: number;
  /** Request timeout for downloads (milliseconds) */
  download_timeout_ms: number;
  /** Emit lifecycle diagnostics at debug level */
  diagnostics: boolean;
}

// -----------------------------------------------------------------------------
// Platform info
// -----------------------------------------------------------------------------

export type Platform = 'linux' | 'darwin' | 'win32' | 'unknown';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const POLL_INTERVAL_SECONDS = 1;
export const POLL_TIMEOUT_SECONDS = 30;

/** Timeout for download requests (milliseconds) */
export const DOWNLOAD_TIMEOUT_MS = 60000;

/** Largest slice written to disk per write call */
export const DOWNLOAD_CHUNK_SIZE = 8192;
