import * as XLSX from 'xlsx';
import { ColumnNotFoundError } from '../../src/matching/errors';
import { InMemoryOrderTable } from '../../src/spreadsheet/memoryTable';
import { SheetOrderTable } from '../../src/spreadsheet/sheetTable';
import { WorkbookReadError } from '../../src/spreadsheet/errors';
import {
  coerceQuantity,
  convertDateColumnsForDisplay,
  filterToNewSheet,
  loadWorkbook,
  openOrderTable,
  selectOrderSheet,
  writeWorkbook,
} from '../../src/spreadsheet/workbook';
import { serialAt } from '../helpers/orders';
import { SALES_REPORT, createWorkbook, createWorkbookBuffer } from '../helpers/workbook';

const KEYWORDS = ['채널추가무료배송', '택배요청'];

describe('loadWorkbook', () => {
  it('should keep date-times as raw serials', () => {
    const workbook = loadWorkbook(createWorkbookBuffer({ orders: SALES_REPORT }));
    const table = openOrderTable(workbook, 'orders');

    expect(table.getRawCell(0, 0)).toEqual({ kind: 'number', value: 45870 });
    expect(table.getRawCell(0, 1)).toEqual({ kind: 'number', value: serialAt(11, 14, 31) });
  });
});

describe('selectOrderSheet', () => {
  const workbook = createWorkbook({ 요약: [['합계']], '상품 주문 상세내역': SALES_REPORT });

  it('should prefer the named sheet', () => {
    expect(selectOrderSheet(workbook, '상품 주문 상세내역')).toBe('상품 주문 상세내역');
  });

  it('should fall back to the first sheet', () => {
    expect(selectOrderSheet(workbook, '없는 시트')).toBe('요약');
  });
});

describe('SheetOrderTable', () => {
  const createTable = (): SheetOrderTable => new SheetOrderTable(createWorkbook({ orders: SALES_REPORT }).Sheets.orders);

  it('should read the header row and count data rows', () => {
    const table = createTable();

    expect(table.headers).toEqual(['주문기준일자', '주문시작시각', '상품명', '옵션', '수량']);
    expect(table.rowCount).toBe(4);
    expect(table.getColumnIndex('상품명')).toBe(2);
    expect(table.getColumnIndex('수하인명')).toBeUndefined();
  });

  it('should tag cells by type', () => {
    const table = createTable();

    expect(table.getRawCell(0, 2)).toEqual({ kind: 'text', value: '주이패턴이불' });
    expect(table.getRawCell(3, 4)).toEqual({ kind: 'text', value: '2' });
    expect(table.getRawCell(10, 0)).toEqual({ kind: 'empty' });
  });

  it('should write to physical rows below the header', () => {
    const table = createTable();

    table.setCell(2, 2, '주이패턴이불 Q');
    table.setCell(3, 4, 5);

    expect(table.getRawCell(0, 2)).toEqual({ kind: 'text', value: '주이패턴이불 Q' });
    expect(table.getRawCell(1, 4)).toEqual({ kind: 'number', value: 5 });
  });

  it('should reject writes outside the header columns', () => {
    expect(() => createTable().setCell(2, 9, 'x')).toThrow(RangeError);
  });

  it('should treat a sheet without cells as empty', () => {
    const table = new SheetOrderTable(XLSX.utils.aoa_to_sheet([]));

    expect(table.headers).toEqual([]);
    expect(table.rowCount).toBe(0);
  });
});

describe('coerceQuantity', () => {
  it('should keep numbers', () => {
    expect(coerceQuantity({ kind: 'number', value: 3 })).toBe(3);
  });

  it('should parse numeric text with thousands separators', () => {
    expect(coerceQuantity({ kind: 'text', value: '1,000' })).toBe(1000);
  });

  it('should turn dates back into serials', () => {
    expect(coerceQuantity({ kind: 'text', value: '2025-01-03' })).toBe(45660);
    expect(coerceQuantity({ kind: 'date', value: new Date(Date.UTC(2025, 0, 3)) })).toBe(45660);
  });

  it('should keep other text and empty cells', () => {
    expect(coerceQuantity({ kind: 'text', value: '두 개' })).toBe('두 개');
    expect(coerceQuantity({ kind: 'empty' })).toBeNull();
  });
});

describe('filterToNewSheet', () => {
  it('should copy delivery rows into a new sheet with the extra columns', () => {
    const workbook = createWorkbook({ '상품 주문 상세내역': SALES_REPORT });

    const result = filterToNewSheet(workbook, '상품 주문 상세내역', '필터링_결과', { keywords: KEYWORDS });

    expect(result).toEqual({ sheetName: '필터링_결과', sourceRows: 4, keptRows: 3 });
    expect(workbook.SheetNames).toEqual(['상품 주문 상세내역', '필터링_결과']);

    const table = openOrderTable(workbook, '필터링_결과');
    expect(table.headers).toEqual([
      '주문기준일자',
      '주문시작시각',
      '상품명',
      '옵션',
      '수량',
      '배송처리상태',
      '메모',
      '수하인명',
      '수하인주소',
      '수하인전화번호',
      '수하인핸드폰번호',
      '박스수량',
      '택배운임',
      '운임구분',
      '품목명',
      '배송메세지',
    ]);
    expect(table.rowCount).toBe(3);
    expect(table.getRawCell(2, 2)).toEqual({ kind: 'text', value: '뜨왈주이패턴베개커버' });
    expect(table.getRawCell(0, 5)).toEqual({ kind: 'text', value: '대기' });
    expect(table.getRawCell(0, 6)).toEqual({ kind: 'empty' });
  });

  it('should keep time serials raw and coerce quantities to numbers', () => {
    const workbook = createWorkbook({ orders: SALES_REPORT });

    filterToNewSheet(workbook, 'orders', 'filtered', { keywords: KEYWORDS });
    const table = openOrderTable(workbook, 'filtered');

    expect(table.getRawCell(0, 1)).toEqual({ kind: 'number', value: serialAt(11, 14, 31) });
    expect(table.getRawCell(2, 4)).toEqual({ kind: 'number', value: 2 });
  });

  it('should not duplicate columns the source already has', () => {
    const rows = SALES_REPORT.map((row, index) => [...row, index === 0 ? '수하인명' : null]);
    const workbook = createWorkbook({ orders: rows });

    filterToNewSheet(workbook, 'orders', 'filtered', { keywords: KEYWORDS, extraColumns: {} });
    const headers = openOrderTable(workbook, 'filtered').headers;

    expect(headers.filter((header) => header === '수하인명')).toHaveLength(1);
    expect(headers).not.toContain('배송처리상태');
  });

  it('should replace a sheet of the same name', () => {
    const workbook = createWorkbook({ orders: SALES_REPORT });

    filterToNewSheet(workbook, 'orders', 'filtered', { keywords: KEYWORDS });
    filterToNewSheet(workbook, 'orders', 'filtered', { keywords: ['매장픽업'] });

    expect(workbook.SheetNames).toEqual(['orders', 'filtered']);
    expect(openOrderTable(workbook, 'filtered').rowCount).toBe(1);
  });

  it('should apply all mode', () => {
    const workbook = createWorkbook({ orders: SALES_REPORT });

    const result = filterToNewSheet(workbook, 'orders', 'filtered', { keywords: ['택배요청', '민트'], mode: 'all' });

    expect(result.keptRows).toBe(1);
  });

  it('should reject a sheet without data rows', () => {
    const workbook = createWorkbook({ orders: [SALES_REPORT[0]] });

    expect(() => filterToNewSheet(workbook, 'orders', 'filtered', { keywords: KEYWORDS })).toThrow(WorkbookReadError);
  });

  it('should reject a sheet without an option column', () => {
    const workbook = createWorkbook({ orders: [['상품명'], ['주이패턴이불']] });

    expect(() => filterToNewSheet(workbook, 'orders', 'filtered', { keywords: KEYWORDS })).toThrow(ColumnNotFoundError);
  });

  it('should reject an unknown source sheet', () => {
    const workbook = createWorkbook({ orders: SALES_REPORT });

    expect(() => filterToNewSheet(workbook, 'missing', 'filtered', { keywords: KEYWORDS })).toThrow(
      'Worksheet "missing" does not exist'
    );
  });
});

describe('convertDateColumnsForDisplay', () => {
  it('should render serial date and time columns as text', () => {
    const table = InMemoryOrderTable.fromRecords([
      { 주문기준일자: 45870, 주문시작시각: serialAt(11, 14, 31), 상품명: '주이패턴이불' },
      { 주문기준일자: '2025-08-01', 주문시작시각: null, 상품명: '뜨왈베개커버' },
    ]);

    const converted = convertDateColumnsForDisplay(table);

    expect(converted).toBe(2);
    expect(table.toRecords()).toEqual([
      { 주문기준일자: '2025-08-01', 주문시작시각: '2025-08-01 11:14:31', 상품명: '주이패턴이불' },
      { 주문기준일자: '2025-08-01', 주문시작시각: null, 상품명: '뜨왈베개커버' },
    ]);
  });

  it('should skip tables without date columns', () => {
    expect(convertDateColumnsForDisplay(InMemoryOrderTable.fromRecords([{ 상품명: 'A' }]))).toBe(0);
  });
});

describe('writeWorkbook', () => {
  it('should produce a buffer that loads back with the written values', () => {
    const workbook = createWorkbook({ orders: SALES_REPORT });
    openOrderTable(workbook, 'orders').setCell(2, 3, '택배요청(1)');

    const reloaded = loadWorkbook(writeWorkbook(workbook));

    expect(openOrderTable(reloaded, 'orders').getRawCell(0, 3)).toEqual({ kind: 'text', value: '택배요청(1)' });
  });
});
