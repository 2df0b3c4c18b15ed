/**
 * Platform Detection
 * Layer: infra
 *
 * Provided ports:
 *   - platform.detect
 *   - platform.processCommands
 *
 * Detects the current platform and picks the OS commands used to
 * list and kill processes by image name.
 */

import * as os from 'os';
import * as path from 'path';
import type { Platform, ProcessCommands } from './types';

// -----------------------------------------------------------------------------
// Port: platform.detect
// -----------------------------------------------------------------------------

/**
 * Detects the current platform.
 */
export function detect(): Platform {
  const platform = os.platform();
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'win32';
    default:
      return 'unknown';
  }
}

// -----------------------------------------------------------------------------
// Port: platform.processCommands
// -----------------------------------------------------------------------------

/** Linux keeps only the first 15 characters of a process name in `comm`. */
export const LINUX_COMM_LENGTH = 15;

/**
 * Strips a trailing .exe: some processes are listed without it.
 */
export function listedName(taskName: string): string {
  return taskName.replace(/\.exe$/i, '');
}

const outputLines = (output: string): string[] =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');

const linuxCommName = (taskName: string): string =>
  listedName(taskName).slice(0, LINUX_COMM_LENGTH);

const WINDOWS_COMMANDS: ProcessCommands = {
  list: (taskName) => ({ file: 'tasklist', args: ['/FI', `IMAGENAME eq ${taskName}`] }),
  kill: (taskName) => ({ file: 'taskkill.exe', args: ['/F', '/IM', taskName] }),
  // tasklist already filtered the output down to the image name
  isListed: (output, taskName) => output.includes(listedName(taskName)),
};

const LINUX_COMMANDS: ProcessCommands = {
  list: () => ({ file: 'ps', args: ['-A', '-o', 'comm='] }),
  kill: (taskName) => ({ file: 'pkill', args: ['-9', '-x', linuxCommName(taskName)] }),
  isListed: (output, taskName) =>
    outputLines(output).some((line) => line === linuxCommName(taskName)),
};

// comm is the executable path on macOS
const DARWIN_COMMANDS: ProcessCommands = {
  list: () => ({ file: 'ps', args: ['-A', '-o', 'comm='] }),
  kill: (taskName) => ({ file: 'pkill', args: ['-9', '-x', listedName(taskName)] }),
  isListed: (output, taskName) =>
    outputLines(output).some((line) => path.posix.basename(line) === listedName(taskName)),
};

/**
 * Returns the process list/kill commands for a platform.
 * Unknown platforms are treated like Linux.
 */
export function processCommands(platform: Platform = detect()): ProcessCommands {
  switch (platform) {
    case 'win32':
      return WINDOWS_COMMANDS;
    case 'darwin':
      return DARWIN_COMMANDS;
    default:
      return LINUX_COMMANDS;
  }
}
