/**
 * Customer-Info Writer
 *
 * Writes the shipping recipient into the matched order. One order with
 * several products spans several rows sharing the same start time; only
 * the first row of such a block receives the recipient, so the courier
 * export does not create one parcel per product.
 */

import { HEADER_OFFSET, DELIVERY_KEYWORDS, ORDER_COLUMNS, RECIPIENT_COLUMNS } from './constants';
import { cellToSerial } from './cellValue';
import { ColumnNotFoundError } from './errors';
import { formatItemDescription } from './itemDescription';
import type { CustomerInfo, LineItem, OrderTable, TimeGroup, WritableCellValue } from './types';

export interface WriteOptions {
  /** Physical row of table index 0 */
  headerOffset: number;
  deliveryKeywords: readonly string[];
}

const DEFAULT_WRITE_OPTIONS: WriteOptions = {
  headerOffset: HEADER_OFFSET,
  deliveryKeywords: DELIVERY_KEYWORDS,
};

/**
 * Groups table indices by their raw order start time.
 * Rows whose start time cannot be read are left out.
 *
 * @returns Groups in first-seen order, indices ascending within each group
 * @throws ColumnNotFoundError when the table has no order time column
 */
export function groupByTimestamp(table: OrderTable, indices: readonly number[]): TimeGroup[] {
  const timeColumn = table.getColumnIndex(ORDER_COLUMNS.ORDER_TIME);
  if (timeColumn === undefined) {
    throw new ColumnNotFoundError(ORDER_COLUMNS.ORDER_TIME);
  }

  const groups = new Map<number, number[]>();
  for (const index of indices) {
    const key = cellToSerial(table.getRawCell(index, timeColumn));
    if (key === null) {
      continue;
    }
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  }

  return [...groups.entries()].map(([key, groupIndices]) => ({
    key,
    indices: [...groupIndices].sort((a, b) => a - b),
  }));
}

/**
 * Writes recipient fields into the first row of every group.
 *
 * A field is written only when its column exists and the value is
 * non-empty; the phone goes to both the phone and the mobile column.
 * Writing the same input twice leaves the same cell values.
 *
 * @returns Number of order blocks written
 */
export function writeCustomerInfo(
  table: OrderTable,
  groups: readonly TimeGroup[],
  customer: CustomerInfo,
  items: readonly LineItem[],
  overrides: Partial<WriteOptions> = {}
): number {
  const options = { ...DEFAULT_WRITE_OPTIONS, ...overrides };
  const description = formatItemDescription(items, options.deliveryKeywords);

  const fields: Array<[column: string, value: WritableCellValue]> = [
    [RECIPIENT_COLUMNS.NAME, customer.name],
    [RECIPIENT_COLUMNS.PHONE, customer.phone],
    [RECIPIENT_COLUMNS.MOBILE, customer.phone],
    [RECIPIENT_COLUMNS.ADDRESS, customer.address],
    [RECIPIENT_COLUMNS.ITEM_DESCRIPTION, description],
  ];

  let updatedBlocks = 0;

  for (const group of groups) {
    if (group.indices.length === 0) {
      continue;
    }

    const physicalRow = group.indices[0] + options.headerOffset;
    for (const [columnName, value] of fields) {
      const column = table.getColumnIndex(columnName);
      if (column !== undefined && value !== '') {
        table.setCell(physicalRow, column, value);
      }
    }

    updatedBlocks++;
  }

  return updatedBlocks;
}
