import { toCellValue, cellToJson, EMPTY_CELL } from '../matching/cellValue';
import { HEADER_OFFSET } from '../matching/constants';
import type { CellValue, OrderTable, WritableCellValue } from '../matching/types';

/**
 * Order table held in memory, built from JSON records.
 *
 * Used by the preview endpoint and by tests. Physical rows follow the sheet
 * convention: row 1 is the header, row 2 the first record.
 */
export class InMemoryOrderTable implements OrderTable {
  public readonly headers: string[];
  private readonly rows: CellValue[][];
  private readonly columnIndex: Map<string, number>;

  constructor(headers: readonly string[], rows: ReadonlyArray<readonly unknown[]>) {
    this.headers = [...headers];
    this.rows = rows.map((row) => this.headers.map((_header, column) => toCellValue(row[column])));
    this.columnIndex = new Map();
    this.headers.forEach((header, column) => {
      if (!this.columnIndex.has(header)) {
        this.columnIndex.set(header, column);
      }
    });
  }

  /**
   * Builds a table from objects keyed by header. Headers are collected in
   * first-seen order across all records.
   */
  static fromRecords(records: ReadonlyArray<Record<string, unknown>>): InMemoryOrderTable {
    const headers: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!headers.includes(key)) {
          headers.push(key);
        }
      }
    }
    return new InMemoryOrderTable(
      headers,
      records.map((record) => headers.map((header) => record[header]))
    );
  }

  get rowCount(): number {
    return this.rows.length;
  }

  getColumnIndex(name: string): number | undefined {
    return this.columnIndex.get(name);
  }

  getRawCell(index: number, column: number): CellValue {
    return this.rows[index]?.[column] ?? EMPTY_CELL;
  }

  setCell(physicalRow: number, column: number, value: WritableCellValue): void {
    const index = physicalRow - HEADER_OFFSET;
    const row = this.rows[index];
    if (!row || column < 0 || column >= this.headers.length) {
      throw new RangeError(`Cell (${physicalRow}, ${column}) is outside the order table`);
    }
    row[column] = toCellValue(value);
  }

  /**
   * Plain rendering of the table, one object per row.
   */
  toRecords(): Array<Record<string, string | number | null>> {
    return this.rows.map((row) =>
      Object.fromEntries(this.headers.map((header, column) => [header, cellToJson(row[column])]))
    );
  }
}

export default InMemoryOrderTable;
