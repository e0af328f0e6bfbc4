/**
 * Workbook I/O for the sales report export.
 *
 * Flow used by the batch endpoint:
 * 1. loadWorkbook        - parse the upload, cells kept raw
 * 2. selectOrderSheet    - the order detail sheet, or the first sheet
 * 3. filterToNewSheet    - courier orders copied to their own sheet
 * 4. (match and write through SheetOrderTable)
 * 5. convertDateColumnsForDisplay, writeWorkbook
 */

import * as XLSX from 'xlsx';
import { cellToText } from '../matching/cellValue';
import { findOptionColumn, optionMatches } from '../matching/candidateFilter';
import { DELIVERY_COLUMNS, HEADER_OFFSET, ORDER_COLUMNS } from '../matching/constants';
import { dateToSerial, formatSerial, tryParseTimestamp } from '../matching/serialDate';
import type { CellValue, FilterMode, OrderTable, WritableCellValue } from '../matching/types';
import { Logging } from '../utils/logger';
import { WorkbookReadError } from './errors';
import { SheetOrderTable } from './sheetTable';

type SheetValue = WritableCellValue | null;

export interface FilterSheetOptions {
  keywords: readonly string[];
  mode?: FilterMode;
  /** Columns appended to every copied row with a fixed value */
  extraColumns?: Record<string, WritableCellValue>;
}

export interface FilterSheetResult {
  sheetName: string;
  sourceRows: number;
  keptRows: number;
}

/** Bookkeeping columns added to the filtered sheet. */
export const FILTER_EXTRA_COLUMNS: Record<string, WritableCellValue> = {
  배송처리상태: '대기',
  메모: '',
};

const ENCRYPTION_HINT = /password|encrypt/i;

// ============================================
// Reading
// ============================================

/**
 * Parses an uploaded workbook. Date-times stay day-serials.
 *
 * @throws WorkbookReadError for unreadable or password-protected files
 */
export function loadWorkbook(buffer: Buffer): XLSX.WorkBook {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    if (ENCRYPTION_HINT.test(reason)) {
      throw new WorkbookReadError('Password-protected workbooks are not supported; remove the password and upload again');
    }
    throw new WorkbookReadError(`The workbook could not be read: ${reason}`);
  }

  if (workbook.SheetNames.length === 0) {
    throw new WorkbookReadError('The workbook contains no worksheets');
  }
  return workbook;
}

/**
 * Picks the sheet holding the order details, falling back to the first one.
 */
export function selectOrderSheet(workbook: XLSX.WorkBook, preferredName: string): string {
  if (workbook.SheetNames.includes(preferredName)) {
    return preferredName;
  }

  const [first] = workbook.SheetNames;
  if (first === undefined) {
    throw new WorkbookReadError('The workbook contains no worksheets');
  }
  Logging.warn(`Sheet "${preferredName}" not found, using "${first}"`);
  return first;
}

export function getSheet(workbook: XLSX.WorkBook, sheetName: string): XLSX.WorkSheet {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new WorkbookReadError(`Worksheet "${sheetName}" does not exist`);
  }
  return sheet;
}

export function openOrderTable(workbook: XLSX.WorkBook, sheetName: string): SheetOrderTable {
  return new SheetOrderTable(getSheet(workbook, sheetName));
}

// ============================================
// Filtering
// ============================================

function toSheetValue(cell: CellValue): SheetValue {
  switch (cell.kind) {
    case 'number':
    case 'text':
      return cell.value;
    case 'date':
      return dateToSerial(cell.value);
    case 'empty':
      return null;
  }
}

/**
 * Quantities must stay numeric in the filtered sheet: "1,000" becomes 1000,
 * a value that was turned into a date goes back to its serial.
 */
export function coerceQuantity(cell: CellValue): SheetValue {
  if (cell.kind !== 'text') {
    return toSheetValue(cell);
  }

  const text = cell.value.trim();
  const asDate = tryParseTimestamp(text);
  if (asDate) {
    return dateToSerial(asDate);
  }

  const asNumber = Number(text.replace(/,/g, ''));
  return Number.isFinite(asNumber) ? asNumber : cell.value;
}

/**
 * Copies the courier-delivery rows of a sheet into a new sheet.
 *
 * Values are copied raw; the quantity column is coerced to numbers. The
 * extra columns and any missing delivery columns are appended. A sheet
 * with the target name is replaced in place.
 *
 * @throws WorkbookReadError when the source sheet has no data rows
 * @throws ColumnNotFoundError when there is no option column
 */
export function filterToNewSheet(
  workbook: XLSX.WorkBook,
  sourceSheetName: string,
  targetSheetName: string,
  options: FilterSheetOptions
): FilterSheetResult {
  const source = openOrderTable(workbook, sourceSheetName);
  if (source.rowCount === 0) {
    throw new WorkbookReadError(`Worksheet "${sourceSheetName}" has no data rows`);
  }

  const optionColumn = findOptionColumn(source.headers);
  const quantityColumn = source.getColumnIndex(ORDER_COLUMNS.QUANTITY);
  const extraColumns = options.extraColumns ?? FILTER_EXTRA_COLUMNS;

  const extraHeaders = Object.keys(extraColumns).filter((name) => !source.headers.includes(name));
  const deliveryHeaders = DELIVERY_COLUMNS.filter(
    (name) => !source.headers.includes(name) && !extraHeaders.includes(name)
  );

  const data: SheetValue[][] = [[...source.headers, ...extraHeaders, ...deliveryHeaders]];

  for (let index = 0; index < source.rowCount; index++) {
    const option = cellToText(source.getRawCell(index, optionColumn));
    if (!optionMatches(option, options.keywords, options.mode ?? 'any')) {
      continue;
    }

    const row = source.headers.map((_header, column) => {
      const cell = source.getRawCell(index, column);
      return column === quantityColumn ? coerceQuantity(cell) : toSheetValue(cell);
    });
    data.push([
      ...row,
      ...extraHeaders.map((name) => extraColumns[name]),
      ...deliveryHeaders.map((): SheetValue => null),
    ]);
  }

  const sheet = XLSX.utils.aoa_to_sheet(data);
  if (workbook.SheetNames.includes(targetSheetName)) {
    workbook.Sheets[targetSheetName] = sheet;
  } else {
    XLSX.utils.book_append_sheet(workbook, sheet, targetSheetName);
  }

  const keptRows = data.length - 1;
  Logging.info(`Filtered ${keptRows} of ${source.rowCount} rows into "${targetSheetName}"`);

  return { sheetName: targetSheetName, sourceRows: source.rowCount, keptRows };
}

// ============================================
// Output
// ============================================

/**
 * Renders serial cells of the date columns as text before saving:
 * 주문기준일자 as YYYY-MM-DD, 주문시작시각 as YYYY-MM-DD HH:MM:SS.
 *
 * @returns Number of cells converted
 */
export function convertDateColumnsForDisplay(table: OrderTable, headerOffset: number = HEADER_OFFSET): number {
  const columns: Array<[name: string, withTime: boolean]> = [
    [ORDER_COLUMNS.ORDER_DATE, false],
    [ORDER_COLUMNS.ORDER_TIME, true],
  ];

  let converted = 0;
  for (const [name, withTime] of columns) {
    const column = table.getColumnIndex(name);
    if (column === undefined) {
      continue;
    }

    for (let index = 0; index < table.rowCount; index++) {
      const cell = table.getRawCell(index, column);
      if (cell.kind === 'number') {
        table.setCell(index + headerOffset, column, formatSerial(cell.value, withTime));
        converted++;
      }
    }
  }
  return converted;
}

export function writeWorkbook(workbook: XLSX.WorkBook): Buffer {
  const output: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return output;
}
