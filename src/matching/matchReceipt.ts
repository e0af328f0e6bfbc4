/**
 * Receipt Matching Cascade
 *
 * Finds the order rows that correspond to one receipt.
 * Every row walks the same stages and stops at the first failure:
 *
 * 1. Guard   - order date, order time and product name must be readable
 * 2. Date    - calendar date of the receipt equals the order date
 * 3. Time    - order start time within ±10 seconds of the approval time
 * 4. Product - receipt's first item name similar to the row's product name
 * 5. Accept  - score = 0.3 + 0.3 + 0.4 × product similarity
 *
 * The trace of every row is part of the result, accepted or not.
 */

import {
  DELIVERY_KEYWORDS,
  HEADER_OFFSET,
  PRODUCT_SIMILARITY_THRESHOLD,
  SCORE_WEIGHTS,
  TIME_TOLERANCE_SECONDS,
} from './constants';
import { cellToDate, cellToJson, cellToText } from './cellValue';
import { matchProductName } from './productSimilarity';
import {
  formatDateTime,
  isSameCalendarDate,
  parseReceiptTimestamp,
  secondsBetween,
} from './serialDate';
import type {
  CellValue,
  MatchCandidate,
  MatchDiagnostics,
  MatchOptions,
  MatchSearchResult,
  OrderRow,
  ReceiptRecord,
  RowTrace,
} from './types';

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  timeToleranceSeconds: TIME_TOLERANCE_SECONDS,
  productThreshold: PRODUCT_SIMILARITY_THRESHOLD,
  deliveryKeywords: DELIVERY_KEYWORDS,
  headerOffset: HEADER_OFFSET,
};

export function resolveMatchOptions(overrides: Partial<MatchOptions> = {}): MatchOptions {
  return { ...DEFAULT_MATCH_OPTIONS, ...overrides };
}

// ============================================
// Individual stages
// ============================================

/**
 * Date stage: exact calendar-date equality, no tolerance.
 * An unreadable order date never matches.
 */
export function matchDate(receiptAt: Date, orderDate: CellValue): boolean {
  const orderAt = cellToDate(orderDate);
  return orderAt !== null && isSameCalendarDate(receiptAt, orderAt);
}

/**
 * Time stage: distance in seconds between the approval time and the
 * order start time. `differenceSeconds` is null for an unreadable cell.
 */
export function compareTime(
  receiptAt: Date,
  orderTime: CellValue,
  toleranceSeconds: number = TIME_TOLERANCE_SECONDS
): { isMatch: boolean; differenceSeconds: number | null } {
  const orderAt = cellToDate(orderTime);
  if (!orderAt) {
    return { isMatch: false, differenceSeconds: null };
  }

  const differenceSeconds = secondsBetween(receiptAt, orderAt);
  return { isMatch: differenceSeconds <= toleranceSeconds, differenceSeconds };
}

export function matchTime(
  receiptAt: Date,
  orderTime: CellValue,
  toleranceSeconds: number = TIME_TOLERANCE_SECONDS
): boolean {
  return compareTime(receiptAt, orderTime, toleranceSeconds).isMatch;
}

/**
 * Composite score of a row that passed every stage.
 *
 * @example
 * calculateMatchScore(1) // 1.0
 * calculateMatchScore(0.8) // 0.92
 */
export function calculateMatchScore(productSimilarity: number): number {
  return SCORE_WEIGHTS.DATE + SCORE_WEIGHTS.TIME + SCORE_WEIGHTS.PRODUCT * productSimilarity;
}

// ============================================
// Row evaluation
// ============================================

interface RowEvaluation {
  trace: RowTrace;
  candidate?: MatchCandidate;
}

function describeMissing(row: OrderRow, productName: string): string {
  const missing: string[] = [];
  if (cellToDate(row.orderDate) === null) missing.push('order date');
  if (cellToDate(row.orderTime) === null) missing.push('order time');
  if (!productName) missing.push('product name');
  return `Missing data: ${missing.join(', ')} empty or unreadable`;
}

function evaluateRow(
  row: OrderRow,
  receiptAt: Date,
  receiptProductName: string,
  options: MatchOptions
): RowEvaluation {
  const productName = cellToText(row.productName).trim();
  const trace: RowTrace = {
    index: row.index,
    productName,
    stage: 'guard',
    dateMatch: false,
    timeMatch: false,
    productMatch: false,
    detail: '',
  };

  // 1. Guard
  const orderDate = cellToDate(row.orderDate);
  const orderTime = cellToDate(row.orderTime);
  if (orderDate === null || orderTime === null || !productName) {
    trace.rejection = 'missing-data';
    trace.detail = describeMissing(row, productName);
    return { trace };
  }

  // 2. Date
  trace.stage = 'date';
  trace.dateMatch = isSameCalendarDate(receiptAt, orderDate);
  if (!trace.dateMatch) {
    trace.rejection = 'date-mismatch';
    trace.detail = `Date mismatch: receipt ${formatDateTime(receiptAt, false)}, order ${formatDateTime(orderDate, false)}`;
    return { trace };
  }

  // 3. Time
  trace.stage = 'time';
  const differenceSeconds = secondsBetween(receiptAt, orderTime);
  trace.timeDifferenceSeconds = differenceSeconds;
  trace.timeMatch = differenceSeconds <= options.timeToleranceSeconds;
  if (!trace.timeMatch) {
    trace.rejection = 'time-mismatch';
    trace.detail = `Time mismatch: ${differenceSeconds}s apart (tolerance ${options.timeToleranceSeconds}s)`;
    return { trace };
  }

  // 4. Product
  trace.stage = 'product';
  const product = matchProductName(receiptProductName, productName, options.productThreshold);
  trace.productMatch = product.isMatch;
  trace.productSimilarity = product.similarity;
  if (!product.isMatch) {
    trace.rejection = 'product-mismatch';
    trace.detail = `Product mismatch (similarity: ${product.similarity.toFixed(3)})`;
    return { trace };
  }

  // 5. Accept
  const score = calculateMatchScore(product.similarity);
  trace.stage = 'accepted';
  trace.score = score;
  trace.detail = `Matched with score ${score.toFixed(3)}`;

  return {
    trace,
    candidate: {
      index: row.index,
      score,
      productSimilarity: product.similarity,
      order: {
        orderDate: cellToJson(row.orderDate),
        orderTime: cellToJson(row.orderTime),
        productName,
        option: cellToJson(row.option),
      },
    },
  };
}

// ============================================
// Cascade
// ============================================

/**
 * Runs the cascade over candidate rows.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same output.
 *
 * @param receipt - Validated receipt; its first line item is the product compared
 * @param rows - Candidate rows, usually already narrowed to delivery orders
 * @returns Accepted rows by descending score (ties keep row order) and the trace
 * @throws ReceiptFormatError when the approval timestamp cannot be parsed
 */
export function findMatchingOrders(
  receipt: ReceiptRecord,
  rows: readonly OrderRow[],
  overrides: Partial<MatchOptions> = {}
): MatchSearchResult {
  const options = resolveMatchOptions(overrides);
  const receiptAt = parseReceiptTimestamp(receipt.approvedAt);
  const receiptProductName = receipt.items[0]?.name ?? '';

  const diagnostics: MatchDiagnostics = {
    totalRows: rows.length,
    checkedRows: 0,
    datePass: 0,
    timePass: 0,
    productPass: 0,
    receipt: {
      approvedAt: receipt.approvedAt,
      productName: receiptProductName,
    },
    attempts: [],
  };
  const candidates: MatchCandidate[] = [];

  for (const row of rows) {
    diagnostics.checkedRows++;
    const { trace, candidate } = evaluateRow(row, receiptAt, receiptProductName, options);

    if (trace.dateMatch) diagnostics.datePass++;
    if (trace.timeMatch) diagnostics.timePass++;
    if (trace.productMatch) diagnostics.productPass++;

    diagnostics.attempts.push(trace);
    if (candidate) {
      candidates.push(candidate);
    }
  }

  // Array.prototype.sort is stable: equal scores keep table order
  candidates.sort((a, b) => b.score - a.score);

  return { candidates, diagnostics };
}

export default findMatchingOrders;
