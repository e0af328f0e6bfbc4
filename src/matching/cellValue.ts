/**
 * Raw cell values of the order table.
 *
 * A cell can surface as a raw serial, a native date-time, or text depending
 * on how the sheet was produced. The table access layer tags every cell once,
 * and the cascade only ever asks for a date, a serial or a string.
 */

import type { CellValue } from './types';
import { dateToSerial, serialToDate, tryParseTimestamp } from './serialDate';

const NUMERIC_TEXT = /^[-+]?\d+(\.\d+)?$/;

export const EMPTY_CELL: CellValue = { kind: 'empty' };

/**
 * Tags a loosely typed value (JSON, spreadsheet library output).
 * Blank strings and non-finite numbers are empty.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return EMPTY_CELL;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : EMPTY_CELL;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? EMPTY_CELL : { kind: 'date', value };
  }
  if (typeof value === 'string') {
    return value.trim() === '' ? EMPTY_CELL : { kind: 'text', value };
  }
  if (typeof value === 'boolean') {
    return { kind: 'text', value: String(value) };
  }
  return EMPTY_CELL;
}

export function isEmptyCell(cell: CellValue): boolean {
  return cell.kind === 'empty';
}

/**
 * Reads a cell as a date-time.
 * Numeric text is treated as a serial; `YYYY-MM-DD[ HH:MM:SS]` text is parsed.
 * Returns null when the cell cannot be interpreted.
 */
export function cellToDate(cell: CellValue): Date | null {
  switch (cell.kind) {
    case 'date':
      return cell.value;
    case 'number': {
      const date = serialToDate(cell.value);
      return Number.isNaN(date.getTime()) ? null : date;
    }
    case 'text': {
      const text = cell.value.trim();
      if (NUMERIC_TEXT.test(text)) {
        return cellToDate({ kind: 'number', value: Number(text) });
      }
      return tryParseTimestamp(text);
    }
    case 'empty':
      return null;
  }
}

/**
 * Reads a cell as a day-serial. Native date-times are converted, so two
 * cells holding the same instant in different shapes share a key.
 */
export function cellToSerial(cell: CellValue): number | null {
  switch (cell.kind) {
    case 'number':
      return cell.value;
    case 'date':
      return dateToSerial(cell.value);
    case 'text': {
      const date = cellToDate(cell);
      return date ? dateToSerial(date) : null;
    }
    case 'empty':
      return null;
  }
}

/**
 * Reads a cell as text. Empty cells become ''.
 */
export function cellToText(cell: CellValue): string {
  switch (cell.kind) {
    case 'text':
      return cell.value;
    case 'number':
      return String(cell.value);
    case 'date':
      return cell.value.toISOString();
    case 'empty':
      return '';
  }
}

/**
 * Plain JSON rendering of a cell for diagnostics and API responses.
 */
export function cellToJson(cell: CellValue): string | number | null {
  switch (cell.kind) {
    case 'number':
    case 'text':
      return cell.value;
    case 'date':
      return cell.value.toISOString();
    case 'empty':
      return null;
  }
}
