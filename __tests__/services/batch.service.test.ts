import {
  batchSettingsFromEnv,
  buildResultFileName,
  processBatch,
  runBatchOnWorkbook,
  type BatchEntry,
  type BatchSettings,
} from '../../src/services/batch.service';
import { resolveMatchOptions } from '../../src/matching/matchReceipt';
import { InMemoryOrderTable } from '../../src/spreadsheet/memoryTable';
import { WorkbookReadError } from '../../src/spreadsheet/errors';
import { loadWorkbook, openOrderTable } from '../../src/spreadsheet/workbook';
import { CUSTOMER_JSON, createOrderTable, createReceiptJson, serialAt } from '../helpers/orders';
import { SALES_REPORT, createWorkbookBuffer } from '../helpers/workbook';

const SETTINGS: BatchSettings = {
  orderSheetName: '상품 주문 상세내역',
  filteredSheetName: '필터링_결과',
  options: resolveMatchOptions(),
};

const PILLOW_RECEIPT = createReceiptJson('2025-08-01 15:30:05', [
  { name: '뜨왈주이패턴베개커버', unit_price: 15000, quantity: 2, amount: 30000, options: '채널추가무료배송' },
]);

const PILLOW_CUSTOMER = { name: '김테스트', phone: '010-9876-5432', address: '부산시 테스트구 2' };

const ENTRIES: BatchEntry[] = [
  { label: 'receipt_a.jpg', receipt: createReceiptJson(), customer: CUSTOMER_JSON },
  { label: 'receipt_b.jpg', receipt: PILLOW_RECEIPT, customer: PILLOW_CUSTOMER },
  { label: 'receipt_c.jpg', receipt: createReceiptJson(), customer: { ...CUSTOMER_JSON, phone: '123' } },
  { label: 'receipt_d.jpg', receipt: createReceiptJson('2025-08-02 11:14:31'), customer: CUSTOMER_JSON },
];

describe('batchService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildResultFileName', () => {
    it('should stamp the local date and time', () => {
      expect(buildResultFileName(new Date(2025, 7, 1, 9, 5, 3))).toBe('matched_orders_20250801_090503.xlsx');
    });
  });

  describe('batchSettingsFromEnv', () => {
    it('should read sheet names and match options from the environment', () => {
      const settings = batchSettingsFromEnv();

      expect(settings.orderSheetName).toBe('상품 주문 상세내역');
      expect(settings.filteredSheetName).toBe('필터링_결과');
      expect(settings.options).toMatchObject({
        timeToleranceSeconds: 10,
        productThreshold: 0.75,
        deliveryKeywords: ['채널추가무료배송', '택배요청'],
      });
    });
  });

  describe('processBatch', () => {
    it('should match every entry in order and count successes', () => {
      const table = createOrderTable([
        { time: serialAt(11, 14, 31), product: '주이패턴이불' },
        { time: serialAt(15, 30, 0), product: '뜨왈주이패턴베개커버' },
      ]);

      const summary = processBatch({ table, options: SETTINGS.options, sheetName: 'orders' }, ENTRIES);

      expect(summary).toMatchObject({ sheetName: 'orders', total: 4, succeeded: 2, failed: 2 });
      expect(summary.results.map((result) => result.status)).toEqual(['matched', 'matched', 'invalid', 'no-match']);
      expect(summary.results[2].message).toBe('Customer info is invalid: phone: phone must have 10 or 11 digits');
      expect(table.toRecords().map((record) => record.수하인명)).toEqual(['홍길동', '김테스트']);
    });

    it('should record thrown errors and keep going', () => {
      const table = InMemoryOrderTable.fromRecords([
        { 주문기준일자: 45870, 주문시작시각: serialAt(11, 14, 31), 상품명: '주이패턴이불' },
      ]);

      const summary = processBatch({ table, options: SETTINGS.options, sheetName: 'orders' }, ENTRIES.slice(0, 2));

      expect(summary.failed).toBe(2);
      expect(summary.results[0]).toEqual({
        label: 'receipt_a.jpg',
        status: 'error',
        message: 'Matching failed',
        error: 'No column containing "옵션" was found in the header',
      });
      expect(summary.results[1].status).toBe('error');
    });

    it('should handle an empty entry list', () => {
      const summary = processBatch(
        { table: createOrderTable([]), options: SETTINGS.options, sheetName: 'orders' },
        []
      );

      expect(summary).toEqual({ sheetName: 'orders', total: 0, succeeded: 0, failed: 0, results: [] });
    });
  });

  describe('runBatchOnWorkbook', () => {
    it('should filter, match and return the updated workbook', () => {
      const buffer = createWorkbookBuffer({ '상품 주문 상세내역': SALES_REPORT });

      const result = runBatchOnWorkbook(buffer, ENTRIES, SETTINGS);

      expect(result.filter).toEqual({ sourceSheet: '상품 주문 상세내역', sourceRows: 4, keptRows: 3 });
      expect(result.summary).toMatchObject({ sheetName: '필터링_결과', total: 4, succeeded: 2, failed: 2 });
      expect(result.convertedCells).toBe(6);
      expect(result.fileName).toMatch(/^matched_orders_\d{8}_\d{6}\.xlsx$/);

      const output = loadWorkbook(result.workbook);
      expect(output.SheetNames).toEqual(['상품 주문 상세내역', '필터링_결과']);

      const table = openOrderTable(output, '필터링_결과');
      const nameColumn = table.getColumnIndex('수하인명');
      const phoneColumn = table.getColumnIndex('수하인전화번호');
      expect(nameColumn).toBeDefined();
      expect(phoneColumn).toBeDefined();
      if (nameColumn === undefined || phoneColumn === undefined) return;

      expect(table.getRawCell(0, nameColumn)).toEqual({ kind: 'text', value: '홍길동' });
      expect(table.getRawCell(0, phoneColumn)).toEqual({ kind: 'text', value: '010-1234-5678' });
      expect(table.getRawCell(1, nameColumn)).toEqual({ kind: 'empty' });
      expect(table.getRawCell(2, nameColumn)).toEqual({ kind: 'text', value: '김테스트' });
      expect(table.getRawCell(0, 0)).toEqual({ kind: 'text', value: '2025-08-01' });
      expect(table.getRawCell(0, 1)).toEqual({ kind: 'text', value: '2025-08-01 11:14:31' });
    });

    it('should leave dates as serials when nothing matched', () => {
      const buffer = createWorkbookBuffer({ '상품 주문 상세내역': SALES_REPORT });

      const result = runBatchOnWorkbook(buffer, ENTRIES.slice(3), SETTINGS);

      expect(result.summary.succeeded).toBe(0);
      expect(result.convertedCells).toBe(0);
      expect(openOrderTable(loadWorkbook(result.workbook), '필터링_결과').getRawCell(0, 0)).toEqual({
        kind: 'number',
        value: 45870,
      });
    });

    it('should fall back to the first sheet', () => {
      const buffer = createWorkbookBuffer({ Sheet1: SALES_REPORT });

      const result = runBatchOnWorkbook(buffer, ENTRIES.slice(0, 1), SETTINGS);

      expect(result.filter.sourceSheet).toBe('Sheet1');
      expect(result.summary.succeeded).toBe(1);
    });

    it('should reject a workbook whose order sheet is empty', () => {
      const buffer = createWorkbookBuffer({ '상품 주문 상세내역': [SALES_REPORT[0]] });

      expect(() => runBatchOnWorkbook(buffer, ENTRIES, SETTINGS)).toThrow(WorkbookReadError);
    });
  });
});
