/**
 * Batch Matching Service
 *
 * Runs a list of receipt/customer pairs against one order workbook.
 *
 * Flow:
 * 1. Load the workbook and pick the order sheet
 * 2. Copy courier orders into the filtered sheet and work on that sheet
 * 3. Match and write every entry in order, one failure never stops the batch
 * 4. Render date columns for display (only when something was written)
 * 5. Serialize the workbook for download
 */

import { env } from '../config';
import { matchOrder, resolveMatchOptions } from '../matching';
import type { MatchOptions, MatchOutcome, OrderTable } from '../matching';
import {
  convertDateColumnsForDisplay,
  filterToNewSheet,
  loadWorkbook,
  openOrderTable,
  selectOrderSheet,
  writeWorkbook,
} from '../spreadsheet';
import { Logging } from '../utils';

// ============================================
// Types
// ============================================

/**
 * Shared state of one batch: the table being written and the options
 * every entry is matched with.
 */
export interface BatchContext {
  table: OrderTable;
  options: MatchOptions;
  sheetName: string;
}

export interface BatchEntry {
  /** Caller supplied name, e.g. the receipt image file name */
  label: string;
  receipt: unknown;
  customer: unknown;
}

export type BatchEntryResult =
  | { label: string; status: 'matched'; message: string; outcome: Extract<MatchOutcome, { status: 'matched' }> }
  | { label: string; status: 'no-match'; message: string; outcome: Extract<MatchOutcome, { status: 'no-match' }> }
  | { label: string; status: 'invalid'; message: string; outcome: Extract<MatchOutcome, { status: 'invalid' }> }
  | { label: string; status: 'error'; message: string; error: string };

export interface BatchSummary {
  sheetName: string;
  total: number;
  succeeded: number;
  failed: number;
  results: BatchEntryResult[];
}

export interface BatchSettings {
  orderSheetName: string;
  filteredSheetName: string;
  options: MatchOptions;
}

export interface BatchRunResult {
  summary: BatchSummary;
  filter: {
    sourceSheet: string;
    sourceRows: number;
    keptRows: number;
  };
  convertedCells: number;
  workbook: Buffer;
  fileName: string;
}

// ============================================
// Helpers
// ============================================

/**
 * Match settings from the environment.
 */
export function batchSettingsFromEnv(): BatchSettings {
  return {
    orderSheetName: env.ORDER_SHEET_NAME,
    filteredSheetName: env.FILTERED_SHEET_NAME,
    options: resolveMatchOptions({
      timeToleranceSeconds: env.MATCH_TIME_TOLERANCE_SECONDS,
      productThreshold: env.MATCH_PRODUCT_THRESHOLD,
      deliveryKeywords: env.DELIVERY_KEYWORDS,
    }),
  };
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Download name stamped with the local time, e.g. "matched_orders_20250801_111431.xlsx".
 */
export function buildResultFileName(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `matched_orders_${date}_${time}.xlsx`;
}

function toEntryResult(label: string, outcome: MatchOutcome): BatchEntryResult {
  switch (outcome.status) {
    case 'matched':
      return { label, status: 'matched', message: outcome.message, outcome };
    case 'no-match':
      return { label, status: 'no-match', message: outcome.message, outcome };
    case 'invalid':
      return { label, status: 'invalid', message: `${outcome.message}: ${outcome.reason}`, outcome };
  }
}

// ============================================
// Batch processing
// ============================================

/**
 * Matches every entry against the context table, in order.
 * Thrown errors are recorded against their entry and the batch goes on.
 */
export function processBatch(context: BatchContext, entries: readonly BatchEntry[]): BatchSummary {
  const results: BatchEntryResult[] = [];

  entries.forEach((entry, position) => {
    Logging.info(`[${position + 1}/${entries.length}] Matching ${entry.label}`);

    try {
      const outcome = matchOrder({ table: context.table, options: context.options }, entry.receipt, entry.customer);
      const result = toEntryResult(entry.label, outcome);
      results.push(result);

      if (outcome.status === 'matched') {
        Logging.success(`${entry.label}: ${outcome.message}`);
        if (outcome.advisory) {
          Logging.warn(`${entry.label}: ${outcome.advisory}`);
        }
      } else {
        Logging.warn(`${entry.label}: ${result.message}`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      Logging.error(`${entry.label}: ${reason}`);
      results.push({ label: entry.label, status: 'error', message: 'Matching failed', error: reason });
    }
  });

  const succeeded = results.filter((result) => result.status === 'matched').length;
  return {
    sheetName: context.sheetName,
    total: entries.length,
    succeeded,
    failed: entries.length - succeeded,
    results,
  };
}

/**
 * Runs a whole batch on an uploaded workbook and returns the updated file.
 *
 * @throws WorkbookReadError, ColumnNotFoundError (nothing is matched then)
 */
export function runBatchOnWorkbook(
  buffer: Buffer,
  entries: readonly BatchEntry[],
  settings: BatchSettings = batchSettingsFromEnv()
): BatchRunResult {
  const workbook = loadWorkbook(buffer);
  const sourceSheet = selectOrderSheet(workbook, settings.orderSheetName);

  const filter = filterToNewSheet(workbook, sourceSheet, settings.filteredSheetName, {
    keywords: settings.options.deliveryKeywords,
    mode: 'any',
  });

  const table = openOrderTable(workbook, settings.filteredSheetName);
  Logging.info(`Working sheet switched to "${settings.filteredSheetName}" (${table.rowCount} rows)`);

  const summary = processBatch(
    { table, options: settings.options, sheetName: settings.filteredSheetName },
    entries
  );

  const convertedCells =
    summary.succeeded > 0 ? convertDateColumnsForDisplay(table, settings.options.headerOffset) : 0;

  Logging.info(`Batch finished: ${summary.succeeded} matched, ${summary.failed} failed, ${summary.total} total`);

  return {
    summary,
    filter: { sourceSheet, sourceRows: filter.sourceRows, keptRows: filter.keptRows },
    convertedCells,
    workbook: writeWorkbook(workbook),
    fileName: buildResultFileName(),
  };
}

export const batchService = {
  processBatch,
  runBatchOnWorkbook,
  batchSettingsFromEnv,
  buildResultFileName,
};

export default batchService;
