/**
 * The CLI's only writers to stdout and stderr.
 */

/* eslint-disable no-console */

export function print(text: string): void {
  console.log(text);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printError(text: string): void {
  console.error(text);
}
