/**
 * Typed failures raised by the matching engine.
 *
 * Ordinary "no match" outcomes are returned as values (see MatchOutcome);
 * these errors are reserved for malformed input and systemic faults.
 */

import { AppError } from '../utils/AppError';

/**
 * A receipt timestamp that matches neither supported format.
 */
export class ReceiptFormatError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ReceiptFormatError';
    Object.setPrototypeOf(this, ReceiptFormatError.prototype);
  }
}

/**
 * A column the cascade depends on is absent from the order table header.
 */
export class ColumnNotFoundError extends AppError {
  public readonly column: string;

  constructor(column: string, message = `Column "${column}" was not found in the order table`) {
    super(message, 422);
    this.name = 'ColumnNotFoundError';
    this.column = column;
    Object.setPrototypeOf(this, ColumnNotFoundError.prototype);
  }
}

/**
 * Matching was attempted before an order table was loaded.
 */
export class TableNotLoadedError extends AppError {
  constructor(message = 'Order worksheet is not loaded') {
    super(message, 422);
    this.name = 'TableNotLoadedError';
    Object.setPrototypeOf(this, TableNotLoadedError.prototype);
  }
}
