/**
 * OrderTable over an xlsx worksheet.
 *
 * The header is the first row of the used range; every row below it is a
 * data row. Cells are read raw (cellDates off), so date-times arrive as
 * day-serials exactly as the sales report stores them.
 */

import * as XLSX from 'xlsx';
import { EMPTY_CELL, cellToText, toCellValue } from '../matching/cellValue';
import type { CellValue, OrderTable, WritableCellValue } from '../matching/types';

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

/**
 * Reads the cell at a zero-based sheet position, if any.
 */
export function readSheetCell(sheet: XLSX.WorkSheet, row: number, column: number): CellValue {
  const cell: unknown = sheet[XLSX.utils.encode_cell({ r: row, c: column })];
  if (!isCellObject(cell) || cell.t === 'e' || cell.t === 'z') {
    return EMPTY_CELL;
  }
  return toCellValue(cell.v);
}

export class SheetOrderTable implements OrderTable {
  public readonly headers: string[];
  private readonly sheet: XLSX.WorkSheet;
  private readonly range: XLSX.Range;
  private readonly columnIndex = new Map<string, number>();

  constructor(sheet: XLSX.WorkSheet) {
    this.sheet = sheet;
    const ref = sheet['!ref'];
    this.range = ref ? XLSX.utils.decode_range(ref) : { s: { r: 0, c: 0 }, e: { r: -1, c: -1 } };

    this.headers = [];
    for (let column = this.range.s.c; column <= this.range.e.c; column++) {
      const header = cellToText(readSheetCell(sheet, this.range.s.r, column)).trim();
      const position = this.headers.length;
      this.headers.push(header);
      if (header && !this.columnIndex.has(header)) {
        this.columnIndex.set(header, position);
      }
    }
  }

  get rowCount(): number {
    return Math.max(0, this.range.e.r - this.range.s.r);
  }

  getColumnIndex(name: string): number | undefined {
    return this.columnIndex.get(name);
  }

  getRawCell(index: number, column: number): CellValue {
    if (index < 0 || index >= this.rowCount || column < 0 || column >= this.headers.length) {
      return EMPTY_CELL;
    }
    return readSheetCell(this.sheet, this.range.s.r + 1 + index, this.range.s.c + column);
  }

  /**
   * Writes a value. Physical row 1 is the header row of the used range.
   */
  setCell(physicalRow: number, column: number, value: WritableCellValue): void {
    if (physicalRow < 1 || column < 0 || column >= this.headers.length) {
      throw new RangeError(`Cell (${physicalRow}, ${column}) is outside the order worksheet`);
    }

    const row = this.range.s.r + physicalRow - 1;
    const address = XLSX.utils.encode_cell({ r: row, c: this.range.s.c + column });
    const cell: XLSX.CellObject = typeof value === 'number' ? { t: 'n', v: value } : { t: 's', v: value };
    this.sheet[address] = cell;

    if (row > this.range.e.r) {
      this.range.e.r = row;
      this.sheet['!ref'] = XLSX.utils.encode_range(this.range);
    }
  }
}

export default SheetOrderTable;
