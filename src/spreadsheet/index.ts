export { InMemoryOrderTable } from './memoryTable';
export { SheetOrderTable, readSheetCell } from './sheetTable';
export { WorkbookReadError } from './errors';
export {
  loadWorkbook,
  selectOrderSheet,
  getSheet,
  openOrderTable,
  filterToNewSheet,
  coerceQuantity,
  convertDateColumnsForDisplay,
  writeWorkbook,
  FILTER_EXTRA_COLUMNS,
  type FilterSheetOptions,
  type FilterSheetResult,
} from './workbook';
