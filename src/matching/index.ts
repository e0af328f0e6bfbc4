/**
 * Receipt-Order Matching Engine
 *
 * This module provides pure, deterministic functions for matching
 * receipts to order spreadsheet rows based on:
 * - Calendar date equality (day-serial aware)
 * - Order start time within a few seconds of card approval
 * - Product name similarity (Ratcliff/Obershelp)
 *
 * Usage:
 * ```typescript
 * import { matchOrder } from './matching';
 *
 * const outcome = matchOrder({ table }, receiptJson, customerJson);
 * console.log(outcome.status); // 'matched' | 'no-match' | 'invalid'
 * ```
 */

// Main functions
export { matchOrder, searchOrders, type MatchContext } from './matchOrder';
export {
  findMatchingOrders,
  matchDate,
  matchTime,
  compareTime,
  calculateMatchScore,
  resolveMatchOptions,
  DEFAULT_MATCH_OPTIONS,
} from './matchReceipt';

// Building blocks (for testing/debugging)
export {
  serialToDate,
  dateToSerial,
  parseReceiptTimestamp,
  tryParseTimestamp,
  formatSerial,
  formatDateTime,
} from './serialDate';
export {
  productSimilarity,
  matchProductName,
  normalizeProductName,
  stripQualifiers,
} from './productSimilarity';
export { findOptionColumn, readOrderRows, filterDeliveryRows, optionMatches } from './candidateFilter';
export { groupByTimestamp, writeCustomerInfo, type WriteOptions } from './customerInfoWriter';
export { formatItemDescription, selectDeliveryItems } from './itemDescription';
export {
  validateReceipt,
  validateCustomerInfo,
  normalizePhone,
  formatZodError,
  receiptSchema,
  customerInfoSchema,
} from './validation';
export { toCellValue, cellToDate, cellToSerial, cellToText, cellToJson } from './cellValue';
export { ReceiptFormatError, ColumnNotFoundError, TableNotLoadedError } from './errors';

// Constants
export {
  TIME_TOLERANCE_SECONDS,
  PRODUCT_SIMILARITY_THRESHOLD,
  SCORE_WEIGHTS,
  ORDER_COLUMNS,
  RECIPIENT_COLUMNS,
  DELIVERY_COLUMNS,
  DELIVERY_KEYWORDS,
  HEADER_OFFSET,
} from './constants';

// Types
export type {
  CellValue,
  WritableCellValue,
  OrderTable,
  LineItem,
  ReceiptRecord,
  CustomerInfo,
  OrderRow,
  FilterMode,
  MatchOptions,
  ProductMatch,
  MatchCandidate,
  CascadeStage,
  RejectionReason,
  RowTrace,
  MatchDiagnostics,
  MatchSearchResult,
  TimeGroup,
  NoMatchReason,
  MatchOutcome,
  ValidationResult,
} from './types';
