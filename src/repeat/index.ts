export { RepeatFunction, RepeatStateError, repeatUntil } from './repeat-function';
export type { Evaluator, RepeatDeps, RepeatOptions, RepeatUntilOptions } from './repeat-function';
