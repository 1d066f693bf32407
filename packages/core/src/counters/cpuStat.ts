import { ParseError } from '@resmon/shared';
import type { CpuSnapshot } from '@resmon/shared';

const INTEGER = /^\d+$/;

export function parseCounter(token: string | undefined, label: string): number {
  if (token === undefined || !INTEGER.test(token)) {
    throw new ParseError(`Expected an integer for ${label}, got "${token ?? ''}"`);
  }
  return Number.parseInt(token, 10);
}

/**
 * Parse the aggregate `cpu` line of `/proc/stat`.
 *
 * The line is split on single spaces, so the double space after the `cpu`
 * label leaves an empty token at index 1 and the user, nice, system and idle
 * counters land at indices 2 to 5.
 */
export function parseCpuSnapshot(source: string): CpuSnapshot {
  const firstLine = source.split('\n', 1)[0].replace(/\r$/, '');
  const tokens = firstLine.split(' ');

  if (tokens.length < 6) {
    throw new ParseError(
      `CPU counter line has ${tokens.length} fields, expected at least 6: "${firstLine}"`,
    );
  }

  return [
    parseCounter(tokens[2], 'cpu user'),
    parseCounter(tokens[3], 'cpu nice'),
    parseCounter(tokens[4], 'cpu system'),
    parseCounter(tokens[5], 'cpu idle'),
  ];
}
