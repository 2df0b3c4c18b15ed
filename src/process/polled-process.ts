/**
 * Polled Process
 * Layer: infra
 *
 * Provided ports:
 *   - process.isRunning
 *   - process.poll
 *   - process.kill
 *
 * Tracks a process by image name rather than by handle, for processes the
 * console did not launch itself (e.g. an engine instance already running
 * on the machine). poll() mirrors a child process handle: null while
 * running, an exit code once gone.
 */

import { execFile } from 'child_process';
import * as core from '@actions/core';
import type { CommandSpec, Platform, ProcessCommands } from '../types';
import { detect, processCommands } from '../platform';
import { errorMessage } from '../utils';

export { listedName } from '../platform';

/**
 * Runs a command and resolves with its stdout. Rejects when the command
 * cannot be started or exits non-zero.
 */
export type ExecFn = (command: CommandSpec, options: { windowsHide: boolean }) => Promise<string>;

export const execCommand: ExecFn = (command, options) =>
  new Promise((resolve, reject) => {
    execFile(command.file, command.args, { windowsHide: options.windowsHide }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });

export interface PolledProcessDeps {
  exec: ExecFn;
  platform: Platform;
}

/**
 * Status reported when the process list cannot be read. Assuming the
 * process is still running keeps callers from acting on a false "exited".
 */
export const RUNNING_WHEN_UNKNOWN = true;

/** Exit code poll() reports once the process is gone; the real code is not observable. */
export const GONE_EXIT_CODE = 0;

export class PolledProcess {
  private readonly commands: ProcessCommands;
  private readonly exec: ExecFn;
  private readonly windowsHide: boolean;

  constructor(
    readonly taskName: string,
    deps: Partial<PolledProcessDeps> = {},
  ) {
    const platform = deps.platform ?? detect();
    this.commands = processCommands(platform);
    this.exec = deps.exec ?? execCommand;
    this.windowsHide = platform === 'win32';
  }

  // ---------------------------------------------------------------------------
  // Port: process.isRunning
  // ---------------------------------------------------------------------------

  /**
   * Checks the OS process list for the task name.
   * Resolves RUNNING_WHEN_UNKNOWN if the list cannot be read.
   */
  async isRunning(): Promise<boolean> {
    let output: string;
    try {
      output = await this.exec(this.commands.list(this.taskName), {
        windowsHide: this.windowsHide,
      });
    } catch (error: unknown) {
      core.warning(
        `Could not query process list for ${this.taskName}; assuming it is running: ${errorMessage(error)}`,
      );
      return RUNNING_WHEN_UNKNOWN;
    }

    return this.commands.isListed(output, this.taskName);
  }

  // ---------------------------------------------------------------------------
  // Port: process.poll
  // ---------------------------------------------------------------------------

  async poll(): Promise<number | null> {
    return (await this.isRunning()) ? null : GONE_EXIT_CODE;
  }

  // ---------------------------------------------------------------------------
  // Port: process.kill
  // ---------------------------------------------------------------------------

  /**
   * Forces the process to terminate. Never rejects: a failed kill and a
   * process that was already gone look the same to the caller.
   */
  async kill(): Promise<void> {
    try {
      await this.exec(this.commands.kill(this.taskName), { windowsHide: this.windowsHide });
    } catch (error: unknown) {
      core.debug(`Kill of ${this.taskName} failed: ${errorMessage(error)}`);
    }
  }
}
