/**
 * Naming helpers for takes, dates and prefixed identifiers.
 */

/**
 * Name of a recorded take, e.g. `sceneA_T3`.
 */
export function captureName(slate: string, take: number | string): string {
  return `${slate}_T${take}`;
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Formats the local calendar date as yyMMdd.
 */
export function dateToString(date: Date): string {
  return `${pad2(date.getFullYear() % 100)}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

export function removePrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}
