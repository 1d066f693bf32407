export class ResmonError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ResmonError';
    this.code = code;
  }
}

export class ParseError extends ResmonError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class NotFoundError extends ResmonError {
  public readonly disks: readonly string[];

  constructor(disks: readonly string[]) {
    super(`No disk statistics found for: ${disks.join(', ')}`, 'DISK_NOT_FOUND');
    this.name = 'NotFoundError';
    this.disks = disks;
  }
}

export class ShapeMismatchError extends ResmonError {
  constructor(left: number, right: number) {
    super(`Cannot subtract vectors of different lengths (${left} and ${right})`, 'SHAPE_MISMATCH');
    this.name = 'ShapeMismatchError';
  }
}

export class DiskMismatchError extends ResmonError {
  public readonly first: string;
  public readonly second: string;

  constructor(first: string, second: string) {
    super(`Disk changed between snapshots (${first} then ${second})`, 'DISK_MISMATCH');
    this.name = 'DiskMismatchError';
    this.first = first;
    this.second = second;
  }
}

export class DivideByZeroError extends ResmonError {
  public readonly quantity: string;

  constructor(quantity: string) {
    super(`Division by zero: ${quantity} is 0`, 'DIVIDE_BY_ZERO');
    this.name = 'DivideByZeroError';
    this.quantity = quantity;
  }
}

export class CounterSourceError extends ResmonError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read counter source ${path}: ${reason}`, 'COUNTER_SOURCE_ERROR', { cause });
    this.name = 'CounterSourceError';
    this.path = path;
  }
}

export class SourceUnavailableError extends ResmonError {
  public readonly failures: number;

  constructor(failures: number) {
    super(
      `Counter sources unreadable for ${failures} consecutive ticks, giving up`,
      'SOURCE_UNAVAILABLE',
    );
    this.name = 'SourceUnavailableError';
    this.failures = failures;
  }
}

export class ConfigValidationError extends ResmonError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}
