/**
 * Candidate Row Selection
 *
 * Only orders flagged for courier shipment can be matched to a receipt.
 * The flag lives in the free-text option column, e.g.
 * "택배요청(0)/민트(0)/Q(20000)".
 */

import { DELIVERY_KEYWORDS, OPTION_COLUMN_MARKER, ORDER_COLUMNS } from './constants';
import { cellToText } from './cellValue';
import { ColumnNotFoundError } from './errors';
import type { FilterMode, OrderRow, OrderTable } from './types';

/**
 * Finds the option column: the first header containing "옵션".
 *
 * @throws ColumnNotFoundError when no header qualifies
 */
export function findOptionColumn(headers: readonly string[]): number {
  const index = headers.findIndex((header) => header.includes(OPTION_COLUMN_MARKER));
  if (index === -1) {
    throw new ColumnNotFoundError(
      OPTION_COLUMN_MARKER,
      `No column containing "${OPTION_COLUMN_MARKER}" was found in the header`
    );
  }
  return index;
}

function requireColumn(table: OrderTable, name: string): number {
  const index = table.getColumnIndex(name);
  if (index === undefined) {
    throw new ColumnNotFoundError(name);
  }
  return index;
}

/**
 * Reads every data row of the table with its cells kept raw.
 *
 * @throws ColumnNotFoundError when a cascade column is missing
 */
export function readOrderRows(table: OrderTable): OrderRow[] {
  const dateColumn = requireColumn(table, ORDER_COLUMNS.ORDER_DATE);
  const timeColumn = requireColumn(table, ORDER_COLUMNS.ORDER_TIME);
  const productColumn = requireColumn(table, ORDER_COLUMNS.PRODUCT_NAME);
  const optionColumn = findOptionColumn(table.headers);

  const rows: OrderRow[] = [];
  for (let index = 0; index < table.rowCount; index++) {
    rows.push({
      index,
      orderDate: table.getRawCell(index, dateColumn),
      orderTime: table.getRawCell(index, timeColumn),
      productName: table.getRawCell(index, productColumn),
      option: table.getRawCell(index, optionColumn),
    });
  }
  return rows;
}

/**
 * Tests option text against delivery keywords (substring, case-sensitive).
 * Blank text never matches, not even with an empty keyword list.
 */
export function optionMatches(
  optionText: string,
  keywords: readonly string[],
  mode: FilterMode = 'any'
): boolean {
  if (!optionText || keywords.length === 0) {
    return false;
  }
  return mode === 'all'
    ? keywords.every((keyword) => optionText.includes(keyword))
    : keywords.some((keyword) => optionText.includes(keyword));
}

/**
 * Keeps rows whose option text carries the delivery markers.
 *
 * @param mode - 'any': at least one keyword, 'all': every keyword
 */
export function filterDeliveryRows(
  rows: readonly OrderRow[],
  keywords: readonly string[] = DELIVERY_KEYWORDS,
  mode: FilterMode = 'any'
): OrderRow[] {
  return rows.filter((row) => optionMatches(cellToText(row.option), keywords, mode));
}
