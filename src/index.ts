/**
 * stage-console-utils
 *
 * Helpers for a virtual-production operator console: a poll-until-done
 * scheduler, a process checker, a file downloader and naming helpers.
 */

export * from './types';
export * from './repeat';
export * from './process';
export { downloadFile, DownloadError } from './download';
export type { DownloadOptions } from './download';
export { captureName, dateToString, removePrefix } from './naming';
export { detect, processCommands } from './platform';
export { loadConfig, getConfig, resetConfig } from './config';
export { parseBooleanFlag } from './utils';
