/**
 * Repeat Function
 * Layer: core
 *
 * Provided ports:
 *   - repeat.start
 *   - repeat.stop
 *   - repeat.until
 *
 * Runs a function at a fixed interval until an evaluator accepts its
 * result, a timeout elapses, or the caller stops it.
 *
 * Lifecycle:
 *   idle -> running -> finished | timed_out | stopped | failed
 *
 * The first cycle runs inside start(), so the function has been called
 * once by the time start() returns, whatever the timeout. Later cycles
 * run from a single owned timer. stop() clears that timer, so no cycle
 * begins after it returns; a call already in flight is not interrupted,
 * but its result is discarded.
 *
 * Errors thrown by the function, the evaluator or a callback move the
 * instance to `failed` and reject `done`.
 */

import * as core from '@actions/core';
import type { RepeatOutcome, RepeatState } from '../types';
import { getConfig } from '../config';
import { errorMessage } from '../utils';

export type Evaluator<R> = (result: R) => boolean;

/**
 * Thrown when start() is called on an instance that already ran.
 */
export class RepeatStateError extends Error {
  constructor(readonly state: RepeatState) {
    super(`Cannot start a repeat function in state '${state}'`);
    this.name = 'RepeatStateError';
  }
}

/**
 * Dependency injection interface for RepeatFunction.
 * Production defaults are used when not provided by tests.
 */
export interface RepeatDeps {
  now: () => number;
}

const defaultDeps: RepeatDeps = {
  now: () => Date.now(),
};

export interface RepeatOptions {
  /** Delay between cycles (default: STAGE_CONSOLE_POLL_INTERVAL) */
  intervalSeconds?: number;
  /** Give up once this much time has passed since start() (default: STAGE_CONSOLE_POLL_TIMEOUT) */
  timeoutSeconds?: number;
  /** Aborting the signal has the same effect as stop() */
  signal?: AbortSignal;
  /** Log lifecycle transitions at debug level (default: STAGE_CONSOLE_DIAGNOSTICS) */
  diagnostics?: boolean;
  deps?: RepeatDeps;
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  const candidate: unknown = value;
  return (
    typeof candidate === 'object' &&
    candidate !== null &&
    'then' in candidate &&
    typeof candidate.then === 'function'
  );
}

// -----------------------------------------------------------------------------
// Port: repeat.start / repeat.stop
// -----------------------------------------------------------------------------

export class RepeatFunction<R, A extends unknown[] = []> {
  /** Settles once, with the terminal outcome */
  readonly done: Promise<RepeatOutcome<R>>;

  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly invoke: () => R | PromiseLike<R>;
  private readonly signal: AbortSignal | undefined;
  private readonly diagnostics: boolean;
  private readonly deps: RepeatDeps;

  private evaluator: Evaluator<R> | undefined;
  private finishCallback: (() => void) | undefined;
  private timeoutCallback: (() => void) | undefined;

  private current: RepeatState = 'idle';
  private startTime = 0;
  private started = false;
  private attempts = 0;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private settled = false;
  private resolveDone: (outcome: RepeatOutcome<R>) => void = () => undefined;
  private rejectDone: (error: unknown) => void = () => undefined;

  constructor(options: RepeatOptions, fn: (...args: A) => R | PromiseLike<R>, ...args: A) {
    this.intervalMs = (options.intervalSeconds ?? getConfig().poll_interval_seconds) * 1000;
    this.timeoutMs = (options.timeoutSeconds ?? getConfig().poll_timeout_seconds) * 1000;
    this.invoke = () => fn(...args);
    this.signal = options.signal;
    this.diagnostics = options.diagnostics ?? getConfig().diagnostics;
    this.deps = options.deps ?? defaultDeps;

    this.done = new Promise<RepeatOutcome<R>>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
  }

  get state(): RepeatState {
    return this.current;
  }

  /**
   * Registers the callback fired once when the evaluator accepts a result.
   */
  addFinishCallback<C extends unknown[]>(callback: (...args: C) => void, ...args: C): this {
    this.finishCallback = () => callback(...args);
    return this;
  }

  /**
   * Registers the callback fired once when the timeout elapses first.
   */
  addTimeoutCallback<C extends unknown[]>(callback: (...args: C) => void, ...args: C): this {
    this.timeoutCallback = () => callback(...args);
    return this;
  }

  /**
   * Starts polling and runs the first cycle before returning.
   *
   * Without an evaluator nothing counts as completion, so the instance
   * runs until it times out or is stopped.
   *
   * @throws RepeatStateError if the instance already started
   */
  start(evaluator?: Evaluator<R>): Promise<RepeatOutcome<R>> {
    if (this.current === 'stopped') {
      return this.done;
    }
    if (this.current !== 'idle') {
      throw new RepeatStateError(this.current);
    }

    if (this.signal?.aborted) {
      this.stop();
      return this.done;
    }
    this.signal?.addEventListener('abort', this.onAbort, { once: true });

    this.evaluator = evaluator;
    this.startTime = this.deps.now();
    this.transition('running');
    this.runCycle();

    return this.done;
  }

  /**
   * Cancels the pending cycle and resolves `done` with `stopped`.
   * Has no effect once the instance reached a terminal state.
   */
  stop(): void {
    if (this.current !== 'idle' && this.current !== 'running') {
      return;
    }
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.transition('stopped');
    this.settle({ status: 'stopped', attempts: this.attempts });
  }

  private readonly onAbort = (): void => {
    this.stop();
  };

  private runCycle(): void {
    try {
      const pending = this.cycle();
      if (pending) {
        void pending.then(undefined, (error: unknown) => {
          this.fail(error);
        });
      }
    } catch (error: unknown) {
      this.fail(error);
    }
  }

  private cycle(): PromiseLike<void> | undefined {
    this.timer = undefined;
    if (this.current !== 'running') {
      return undefined;
    }

    const elapsedMs = this.deps.now() - this.startTime;
    if (elapsedMs > this.timeoutMs && this.started) {
      this.transition('timed_out');
      this.timeoutCallback?.();
      this.settle({ status: 'timed_out', attempts: this.attempts });
      return undefined;
    }

    this.started = true;
    this.attempts += 1;

    const pending = this.invoke();
    if (isPromiseLike(pending)) {
      return pending.then((result) => this.evaluate(result));
    }
    this.evaluate(pending);
    return undefined;
  }

  private evaluate(result: R): void {
    // Stopped while the call was in flight
    if (!this.isRunning()) {
      return;
    }

    const accepted = result ? (this.evaluator?.(result) ?? false) : false;

    // The evaluator itself may have stopped the instance
    if (!this.isRunning()) {
      return;
    }

    if (accepted) {
      this.transition('finished');
      this.finishCallback?.();
      this.settle({ status: 'finished', value: result, attempts: this.attempts });
      return;
    }

    this.timer = setTimeout(() => this.runCycle(), this.intervalMs);
  }

  private isRunning(): boolean {
    return this.current === 'running';
  }

  private transition(next: RepeatState): void {
    if (this.diagnostics) {
      core.debug(`repeat: ${this.current} -> ${next} after ${this.attempts} attempt(s)`);
    }
    this.current = next;
  }

  private settle(outcome: RepeatOutcome<R>): void {
    if (this.settled) return;
    this.settled = true;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.resolveDone(outcome);
  }

  private fail(error: unknown): void {
    if (this.settled) return;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.diagnostics) {
      core.debug(`repeat: failed: ${errorMessage(error)}`);
    }
    this.current = 'failed';
    this.settled = true;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.rejectDone(error);
  }
}

// -----------------------------------------------------------------------------
// Port: repeat.until
// -----------------------------------------------------------------------------

export interface RepeatUntilOptions<R> extends RepeatOptions {
  fn: () => R | PromiseLike<R>;
  evaluator?: Evaluator<R>;
}

/**
 * Creates a RepeatFunction, starts it, and returns its outcome.
 */
export function repeatUntil<R>(options: RepeatUntilOptions<R>): Promise<RepeatOutcome<R>> {
  const { fn, evaluator, ...rest } = options;
  return new RepeatFunction<R>(rest, fn).start(evaluator);
}
