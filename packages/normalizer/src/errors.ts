import type { RecordColumn } from './record';

/**
 * Row-local failure. The orchestrator drops the row and keeps going.
 */
export class RecordNormalizationError extends Error {
  readonly column: RecordColumn | null;

  constructor(message: string, options: { column?: RecordColumn | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RecordNormalizationError';
    this.column = options.column ?? null;
  }
}

export class TimestampParseError extends RecordNormalizationError {
  readonly value: string;

  constructor(value: string, cause: Error) {
    super(`Unable to parse timestamp '${value}': ${cause.message}`, { column: 'Timestamp', cause });
    this.name = 'TimestampParseError';
    this.value = value;
  }
}

export class DurationParseError extends RecordNormalizationError {
  readonly value: string;

  constructor(value: string, cause: Error, column: RecordColumn | null = null) {
    super(`Unable to parse duration '${value}': ${cause.message}`, { column, cause });
    this.name = 'DurationParseError';
    this.value = value;
  }
}

export class RecordShapeError extends RecordNormalizationError {
  readonly fieldCount: number;

  constructor(fieldCount: number, expected: number) {
    super(`Expected ${expected} fields but found ${fieldCount}`);
    this.name = 'RecordShapeError';
    this.fieldCount = fieldCount;
  }
}
