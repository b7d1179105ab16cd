import { InvalidArgumentError } from 'commander';

/** Commander parser for signed integers (e.g. --offset -2). */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer (got "${value}")`);
  }
  return parseInt(value, 10);
}

/** Commander accumulator for repeatable options (e.g. --range a --range b). */
export function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}
