/**
 * Match-and-write entry point.
 *
 * Flow:
 * 1. Validate receipt and customer (invalid → 'invalid' outcome)
 * 2. Read raw order rows, keep delivery orders
 * 3. Run the cascade
 * 4. Write the recipient into the best candidate's order block
 *
 * When several rows qualify, the highest score is written without asking.
 * The candidate count is surfaced as an advisory so the caller can flag
 * the receipt for a second look.
 */

import { filterDeliveryRows, readOrderRows } from './candidateFilter';
import { cellToSerial } from './cellValue';
import { TableNotLoadedError } from './errors';
import { findMatchingOrders, resolveMatchOptions } from './matchReceipt';
import { groupByTimestamp, writeCustomerInfo } from './customerInfoWriter';
import { validateCustomerInfo, validateReceipt } from './validation';
import type {
  MatchDiagnostics,
  MatchOptions,
  MatchOutcome,
  MatchSearchResult,
  OrderTable,
  ReceiptRecord,
} from './types';

/**
 * Everything a single match needs besides the receipt itself.
 * Batches build one context and reuse it for every receipt.
 */
export interface MatchContext {
  table: OrderTable | null;
  options?: Partial<MatchOptions>;
}

function requireTable(context: MatchContext): OrderTable {
  if (!context.table) {
    throw new TableNotLoadedError();
  }
  return context.table;
}

function emptyDiagnostics(receipt: ReceiptRecord): MatchDiagnostics {
  return {
    totalRows: 0,
    checkedRows: 0,
    datePass: 0,
    timePass: 0,
    productPass: 0,
    receipt: {
      approvedAt: receipt.approvedAt,
      productName: receipt.items[0]?.name ?? '',
    },
    attempts: [],
  };
}

/**
 * Indices of the delivery rows sharing the start time of `index`, i.e. the
 * order block it belongs to.
 */
function orderBlockIndices(table: OrderTable, index: number, keywords: readonly string[]): number[] {
  const rows = filterDeliveryRows(readOrderRows(table), keywords, 'any');
  const target = rows.find((row) => row.index === index);
  const key = target ? cellToSerial(target.orderTime) : null;
  if (key === null) {
    return [index];
  }
  return rows.filter((row) => cellToSerial(row.orderTime) === key).map((row) => row.index);
}

/**
 * Runs the cascade over the delivery orders of the table without writing.
 *
 * @returns null when the table holds no delivery orders at all
 * @throws TableNotLoadedError, ColumnNotFoundError
 */
export function searchOrders(
  context: MatchContext,
  receipt: ReceiptRecord
): MatchSearchResult | null {
  const table = requireTable(context);
  const options = resolveMatchOptions(context.options);

  const deliveryRows = filterDeliveryRows(readOrderRows(table), options.deliveryKeywords, 'any');
  if (deliveryRows.length === 0) {
    return null;
  }

  return findMatchingOrders(receipt, deliveryRows, options);
}

/**
 * Matches one receipt against the order table and writes the customer
 * details into the best match.
 *
 * @param receipt - Receipt JSON from the extraction service (validated here)
 * @param customer - Recipient JSON from the extraction service (validated here)
 */
export function matchOrder(context: MatchContext, receipt: unknown, customer: unknown): MatchOutcome {
  const receiptResult = validateReceipt(receipt);
  if (!receiptResult.ok) {
    return {
      status: 'invalid',
      field: 'receipt',
      reason: receiptResult.reason,
      message: 'Receipt data is invalid',
    };
  }

  const customerResult = validateCustomerInfo(customer);
  if (!customerResult.ok) {
    return {
      status: 'invalid',
      field: 'customer',
      reason: customerResult.reason,
      message: 'Customer info is invalid',
    };
  }

  const table = requireTable(context);
  const options = resolveMatchOptions(context.options);
  const search = searchOrders(context, receiptResult.value);

  if (!search) {
    return {
      status: 'no-match',
      reason: 'no-delivery-orders',
      message: 'No orders are marked for courier delivery',
      diagnostics: emptyDiagnostics(receiptResult.value),
    };
  }

  const { candidates, diagnostics } = search;
  if (candidates.length === 0) {
    return {
      status: 'no-match',
      reason: 'no-candidate',
      message: 'No matching order was found',
      diagnostics,
    };
  }

  const best = candidates[0];
  const groups = groupByTimestamp(table, orderBlockIndices(table, best.index, options.deliveryKeywords));
  const updatedBlocks = writeCustomerInfo(table, groups, customerResult.value, receiptResult.value.items, {
    headerOffset: options.headerOffset,
    deliveryKeywords: options.deliveryKeywords,
  });

  const multiple = candidates.length > 1;
  return {
    status: 'matched',
    best,
    candidates,
    candidateCount: candidates.length,
    updatedBlocks,
    advisory: multiple
      ? `${candidates.length} orders matched; the highest scoring one was selected`
      : null,
    message: multiple
      ? `Customer info written to the best of ${candidates.length} matching orders`
      : 'Order matched and customer info written',
    diagnostics,
  };
}

export default matchOrder;
