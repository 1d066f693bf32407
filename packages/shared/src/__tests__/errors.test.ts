import { describe, it, expect } from 'vitest';
import {
  ResmonError,
  ParseError,
  NotFoundError,
  ShapeMismatchError,
  DiskMismatchError,
  DivideByZeroError,
  CounterSourceError,
  SourceUnavailableError,
  ConfigValidationError,
} from '../utils/errors.js';

describe('ResmonError', () => {
  it('should create an error with message and code', () => {
    const error = new ResmonError('something went wrong', 'GENERIC_ERROR');
    expect(error.message).toBe('something went wrong');
    expect(error.code).toBe('GENERIC_ERROR');
    expect(error.name).toBe('ResmonError');
  });

  it('should be an instance of Error', () => {
    const error = new ResmonError('test', 'TEST');
    expect(error).toBeInstanceOf(Error);
    expect(error.stack).toBeDefined();
  });

  it('should carry a cause when given one', () => {
    const cause = new Error('root');
    const error = new ResmonError('wrapped', 'TEST', { cause });
    expect(error.cause).toBe(cause);
  });
});

describe('ParseError', () => {
  it('should keep the message it is given', () => {
    const error = new ParseError('bad token "x"');
    expect(error.message).toBe('bad token "x"');
    expect(error.code).toBe('PARSE_ERROR');
    expect(error.name).toBe('ParseError');
  });
});

describe('NotFoundError', () => {
  it('should list the disks that were searched for', () => {
    const error = new NotFoundError(['sda', 'nvme0n1']);
    expect(error.message).toBe('No disk statistics found for: sda, nvme0n1');
    expect(error.code).toBe('DISK_NOT_FOUND');
    expect(error.disks).toEqual(['sda', 'nvme0n1']);
  });
});

describe('ShapeMismatchError', () => {
  it('should report both lengths', () => {
    const error = new ShapeMismatchError(4, 3);
    expect(error.message).toBe('Cannot subtract vectors of different lengths (4 and 3)');
    expect(error.code).toBe('SHAPE_MISMATCH');
  });
});

describe('DiskMismatchError', () => {
  it('should name both disks', () => {
    const error = new DiskMismatchError('sdb', 'sda');
    expect(error.message).toBe('Disk changed between snapshots (sdb then sda)');
    expect(error.code).toBe('DISK_MISMATCH');
    expect(error.first).toBe('sdb');
    expect(error.second).toBe('sda');
  });
});

describe('DivideByZeroError', () => {
  it('should name the zero quantity', () => {
    const error = new DivideByZeroError('total CPU ticks');
    expect(error.message).toBe('Division by zero: total CPU ticks is 0');
    expect(error.code).toBe('DIVIDE_BY_ZERO');
    expect(error.quantity).toBe('total CPU ticks');
  });
});

describe('CounterSourceError', () => {
  it('should include the path and the cause message', () => {
    const cause = new Error('ENOENT: no such file or directory');
    const error = new CounterSourceError('/proc/stat', cause);
    expect(error.message).toBe(
      'Cannot read counter source /proc/stat: ENOENT: no such file or directory',
    );
    expect(error.path).toBe('/proc/stat');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('COUNTER_SOURCE_ERROR');
  });

  it('should stringify a non-Error cause', () => {
    const error = new CounterSourceError('/proc/diskstats', 'busy');
    expect(error.message).toBe('Cannot read counter source /proc/diskstats: busy');
  });
});

describe('SourceUnavailableError', () => {
  it('should record the failure count', () => {
    const error = new SourceUnavailableError(5);
    expect(error.message).toBe('Counter sources unreadable for 5 consecutive ticks, giving up');
    expect(error.failures).toBe(5);
    expect(error.code).toBe('SOURCE_UNAVAILABLE');
  });
});

describe('ConfigValidationError', () => {
  it('should join errors with newlines', () => {
    const error = new ConfigValidationError(['error1', 'error2']);
    expect(error.message).toBe('Configuration validation failed:\nerror1\nerror2');
    expect(error.errors).toEqual(['error1', 'error2']);
    expect(error.code).toBe('CONFIG_VALIDATION_ERROR');
  });
});

describe('error hierarchy and discrimination', () => {
  it('all custom errors should extend ResmonError', () => {
    const errors = [
      new ParseError('x'),
      new NotFoundError(['sda']),
      new ShapeMismatchError(1, 2),
      new DiskMismatchError('sda', 'sdb'),
      new DivideByZeroError('x'),
      new CounterSourceError('/proc/stat', new Error('x')),
      new SourceUnavailableError(1),
      new ConfigValidationError(['x']),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(ResmonError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('each error subclass should have a unique code', () => {
    const codes = [
      new ParseError('x'),
      new NotFoundError(['sda']),
      new ShapeMismatchError(1, 2),
      new DiskMismatchError('sda', 'sdb'),
      new DivideByZeroError('x'),
      new CounterSourceError('/proc/stat', new Error('x')),
      new SourceUnavailableError(1),
      new ConfigValidationError(['x']),
    ].map((e) => e.code);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should be possible to discriminate errors by name', () => {
    const names = [new ParseError('x'), new NotFoundError(['sda']), new DivideByZeroError('x')].map(
      (e) => e.name,
    );
    expect(names).toEqual(['ParseError', 'NotFoundError', 'DivideByZeroError']);
  });
});
