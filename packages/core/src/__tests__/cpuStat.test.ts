import { describe, it, expect } from 'vitest';
import { ParseError } from '@resmon/shared';
import { parseCpuSnapshot, parseCounter } from '../counters/cpuStat.js';

const PROC_STAT = [
  'cpu  100 0 0 300 7 0 2 0 0 0',
  'cpu0 50 0 0 150 3 0 1 0 0 0',
  'cpu1 50 0 0 150 4 0 1 0 0 0',
  'intr 123456 0 0',
  'ctxt 987654',
  '',
].join('\n');

describe('parseCounter', () => {
  it('should parse a non-negative integer', () => {
    expect(parseCounter('42', 'x')).toBe(42);
    expect(parseCounter('0', 'x')).toBe(0);
  });

  it('should reject negative, fractional and empty tokens', () => {
    expect(() => parseCounter('-1', 'x')).toThrow(ParseError);
    expect(() => parseCounter('1.5', 'x')).toThrow(ParseError);
    expect(() => parseCounter('', 'x')).toThrow('Expected an integer for x, got ""');
    expect(() => parseCounter(undefined, 'x')).toThrow('Expected an integer for x, got ""');
  });
});

describe('parseCpuSnapshot', () => {
  it('should read user, nice, system and idle from the aggregate cpu line', () => {
    expect(parseCpuSnapshot(PROC_STAT)).toEqual([100, 0, 0, 300]);
  });

  it('should only look at the first line', () => {
    expect(parseCpuSnapshot('cpu  1 2 3 4 5\nnot a counter line')).toEqual([1, 2, 3, 4]);
  });

  it('should accept a line with exactly six tokens', () => {
    expect(parseCpuSnapshot('cpu  11 22 33 44')).toEqual([11, 22, 33, 44]);
  });

  it('should strip a trailing carriage return', () => {
    expect(parseCpuSnapshot('cpu  1 2 3 4\r\n')).toEqual([1, 2, 3, 4]);
  });

  it('should throw ParseError when the line has fewer than six tokens', () => {
    expect(() => parseCpuSnapshot('cpu  1 2 3')).toThrow(ParseError);
    expect(() => parseCpuSnapshot('cpu  1 2 3')).toThrow(
      'CPU counter line has 5 fields, expected at least 6: "cpu  1 2 3"',
    );
  });

  it('should throw ParseError for an empty source', () => {
    expect(() => parseCpuSnapshot('')).toThrow(ParseError);
  });

  it('should throw ParseError when a counter is not an integer', () => {
    expect(() => parseCpuSnapshot('cpu  10 x 0 300 0')).toThrow(
      'Expected an integer for cpu nice, got "x"',
    );
  });

  it('should throw ParseError when the label is followed by one space', () => {
    // Without the second space the line splits into five tokens
    expect(() => parseCpuSnapshot('cpu 100 0 0 300')).toThrow(ParseError);
  });
});
