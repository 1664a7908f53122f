/**
 * Feature engine errors
 *
 * Data-quality problems (MalformedTimestamp, UndefinedMetric) are handled
 * where they occur with documented defaults, so the pipeline always
 * completes. Configuration problems (UnknownColumn, InvalidOption, and
 * InsufficientData when splitting) are thrown to the caller.
 */

import type { FieldValue } from './types/index.js';

/**
 * Base error for all feature engine errors
 */
export abstract class FeatureError extends Error {
  abstract readonly code: string;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A row's ordering field could not be parsed. Collected by the grouper,
 * never thrown by the engine.
 */
export class MalformedTimestampError extends FeatureError {
  readonly code = 'MALFORMED_TIMESTAMP';
  readonly rowIndex: number;
  readonly column: string;
  readonly value: FieldValue;

  constructor(rowIndex: number, column: string, value: FieldValue) {
    const shown = value === undefined ? 'missing value' : `"${String(value)}"`;
    super(`Row ${rowIndex}: cannot parse ${column} (${shown})`, { rowIndex, column, value });
    this.rowIndex = rowIndex;
    this.column = column;
    this.value = value;
  }
}

/**
 * Not enough rows to build the requested folds
 */
export class InsufficientDataError extends FeatureError {
  readonly code = 'INSUFFICIENT_DATA';
  readonly required: number;
  readonly actual: number;

  constructor(message: string, required: number, actual: number, context?: Record<string, unknown>) {
    super(message, { ...context, required, actual });
    this.required = required;
    this.actual = actual;
  }
}

/**
 * A ratio whose denominator is zero and which has no neutral default
 */
export class UndefinedMetricError extends FeatureError {
  readonly code = 'UNDEFINED_METRIC';
  readonly metric: string;

  constructor(metric: string, message: string, context?: Record<string, unknown>) {
    super(message, { ...context, metric });
    this.metric = metric;
  }
}

/**
 * A requested feature references a column the table does not have
 */
export class UnknownColumnError extends FeatureError {
  readonly code = 'UNKNOWN_COLUMN';
  readonly column: string;

  constructor(column: string, available: readonly string[], requiredBy?: string) {
    const by = requiredBy ? ` (required by ${requiredBy})` : '';
    super(`Unknown column "${column}"${by}`, { column, available: [...available], requiredBy });
    this.column = column;
  }
}

/**
 * Bad configuration value (window size, alpha, fold count, ...)
 */
export class InvalidOptionError extends FeatureError {
  readonly code = 'INVALID_OPTION';
  readonly option: string;

  constructor(option: string, message: string, context?: Record<string, unknown>) {
    super(`Invalid option "${option}": ${message}`, { ...context, option });
    this.option = option;
  }
}

export function isFeatureError(error: unknown): error is FeatureError {
  return error instanceof FeatureError;
}
