/**
 * Tests for PolledProcess and waitForProcessExit.
 *
 * Mocks: @actions/core (warning/debug). The OS command runner is injected.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as core from '@actions/core';
import {
  PolledProcess,
  listedName,
  waitForProcessExit,
  GONE_EXIT_CODE,
} from '../../src/process';
import type { ExecFn } from '../../src/process';

vi.mock('@actions/core');

const PS_OUTPUT = 'systemd\nbash\nUnrealEditor\n';
const TASKLIST_OUTPUT = [
  'Image Name                     PID Session Name        Session#    Mem Usage',
  '========================= ======== ================ =========== ============',
  'UnrealEditor.exe              4242 Console                    1  1,024,000 K',
].join('\r\n');
const TASKLIST_EMPTY = 'INFO: No tasks are running which match the specified criteria.';

function makeExec(): Mock<ExecFn> {
  return vi.fn<ExecFn>();
}

beforeEach((): void => {
  vi.mocked(core.warning).mockClear();
  vi.mocked(core.debug).mockClear();
});

// -----------------------------------------------------------------------------
// listedName
// -----------------------------------------------------------------------------

describe('listedName', () => {
  it('strips a trailing .exe in any case', (): void => {
    expect(listedName('UnrealEditor.exe')).toBe('UnrealEditor');
    expect(listedName('UnrealEditor.EXE')).toBe('UnrealEditor');
  });

  it('leaves other names alone', (): void => {
    expect(listedName('UnrealEditor')).toBe('UnrealEditor');
    expect(listedName('exe.tool')).toBe('exe.tool');
  });
});

// -----------------------------------------------------------------------------
// isRunning / poll
// -----------------------------------------------------------------------------

describe('isRunning', () => {
  it('queries ps on linux and finds the name without .exe', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue(PS_OUTPUT);
    const target = new PolledProcess('UnrealEditor.exe', { platform: 'linux', exec });

    await expect(target.isRunning()).resolves.toBe(true);
    expect(exec).toHaveBeenCalledWith(
      { file: 'ps', args: ['-A', '-o', 'comm='] },
      { windowsHide: false },
    );
  });

  it('queries tasklist on Windows with the window hidden', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue(TASKLIST_OUTPUT);
    const target = new PolledProcess('UnrealEditor.exe', { platform: 'win32', exec });

    await expect(target.isRunning()).resolves.toBe(true);
    expect(exec).toHaveBeenCalledWith(
      { file: 'tasklist', args: ['/FI', 'IMAGENAME eq UnrealEditor.exe'] },
      { windowsHide: true },
    );
  });

  it('reports not running when the name is absent', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue(TASKLIST_EMPTY);
    const target = new PolledProcess('UnrealEditor.exe', { platform: 'win32', exec });

    await expect(target.isRunning()).resolves.toBe(false);
  });

  it('does not match a name that only appears inside another on linux', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue('systemd\nbash\nssh-agent\n');
    const target = new PolledProcess('sh', { platform: 'linux', exec });

    await expect(target.isRunning()).resolves.toBe(false);
  });

  it('finds a long name under its truncated linux comm', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue('systemd\nUnrealEditor-Li\n');
    const target = new PolledProcess('UnrealEditor-Linux', { platform: 'linux', exec });

    await expect(target.isRunning()).resolves.toBe(true);
  });

  it('assumes running and warns when the query fails', async (): Promise<void> => {
    const exec = makeExec().mockRejectedValue(new Error('The handle is invalid'));
    const target = new PolledProcess('UnrealEditor.exe', { platform: 'win32', exec });

    await expect(target.isRunning()).resolves.toBe(true);
    expect(core.warning).toHaveBeenCalledWith(
      'Could not query process list for UnrealEditor.exe; assuming it is running: The handle is invalid',
    );
  });
});

describe('poll', () => {
  it('returns null while the process is running', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue(PS_OUTPUT);
    const target = new PolledProcess('UnrealEditor', { platform: 'linux', exec });

    await expect(target.poll()).resolves.toBeNull();
  });

  it('returns an exit code once the process is gone', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue('systemd\nbash\n');
    const target = new PolledProcess('UnrealEditor', { platform: 'linux', exec });

    await expect(target.poll()).resolves.toBe(GONE_EXIT_CODE);
  });
});

// -----------------------------------------------------------------------------
// kill
// -----------------------------------------------------------------------------

describe('kill', () => {
  it('runs taskkill with force on Windows', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue('SUCCESS');
    const target = new PolledProcess('UnrealEditor.exe', { platform: 'win32', exec });

    await target.kill();

    expect(exec).toHaveBeenCalledWith(
      { file: 'taskkill.exe', args: ['/F', '/IM', 'UnrealEditor.exe'] },
      { windowsHide: true },
    );
  });

  it('runs pkill -9 on darwin', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue('');
    const target = new PolledProcess('UnrealEditor', { platform: 'darwin', exec });

    await target.kill();

    expect(exec).toHaveBeenCalledWith(
      { file: 'pkill', args: ['-9', '-x', 'UnrealEditor'] },
      { windowsHide: false },
    );
  });

  it('resolves and logs at debug level when the kill fails', async (): Promise<void> => {
    const exec = makeExec().mockRejectedValue(new Error('Command failed: pkill'));
    const target = new PolledProcess('UnrealEditor', { platform: 'linux', exec });

    await expect(target.kill()).resolves.toBeUndefined();
    expect(core.debug).toHaveBeenCalledWith('Kill of UnrealEditor failed: Command failed: pkill');
  });
});

// -----------------------------------------------------------------------------
// waitForProcessExit
// -----------------------------------------------------------------------------

describe('waitForProcessExit', () => {
  const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  beforeEach((): void => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('finishes once the process disappears', async (): Promise<void> => {
    const exec = makeExec()
      .mockResolvedValueOnce(PS_OUTPUT)
      .mockResolvedValueOnce(PS_OUTPUT)
      .mockResolvedValue('systemd\nbash\n');
    const target = new PolledProcess('UnrealEditor', { platform: 'linux', exec });

    const done = waitForProcessExit(target, {
      intervalSeconds: 1,
      timeoutSeconds: 30,
      diagnostics: false,
    });
    await flush();
    await vi.advanceTimersByTimeAsync(2000);

    await expect(done).resolves.toEqual({ status: 'finished', value: true, attempts: 3 });
    expect(exec).toHaveBeenCalledTimes(3);
  });

  it('times out while the process keeps running', async (): Promise<void> => {
    const exec = makeExec().mockResolvedValue(PS_OUTPUT);
    const target = new PolledProcess('UnrealEditor', { platform: 'linux', exec });

    const done = waitForProcessExit(target, {
      intervalSeconds: 1,
      timeoutSeconds: 2,
      diagnostics: false,
    });
    await flush();
    await vi.advanceTimersByTimeAsync(5000);

    await expect(done).resolves.toEqual({ status: 'timed_out', attempts: 3 });
  });
});
