/**
 * Polls a named process until it is gone.
 * Resolves `finished` with value `true` once the process list no longer shows it.
 */

import type { RepeatOutcome } from '../types';
import { RepeatFunction } from '../repeat';
import type { RepeatOptions } from '../repeat';
import type { PolledProcess } from './polled-process';

export function waitForProcessExit(
  target: PolledProcess,
  options: RepeatOptions = {},
): Promise<RepeatOutcome<boolean>> {
  const repeat = new RepeatFunction(options, async () => !(await target.isRunning()));
  return repeat.start((gone) => gone);
}
