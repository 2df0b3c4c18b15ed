export {
  PolledProcess,
  execCommand,
  listedName,
  RUNNING_WHEN_UNKNOWN,
  GONE_EXIT_CODE,
} from './polled-process';
export type { ExecFn, PolledProcessDeps } from './polled-process';
export { waitForProcessExit } from './wait-for-exit';
