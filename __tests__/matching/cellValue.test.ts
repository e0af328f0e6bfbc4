import {
  EMPTY_CELL,
  cellToDate,
  cellToJson,
  cellToSerial,
  cellToText,
  isEmptyCell,
  toCellValue,
} from '../../src/matching/cellValue';

const noon = new Date(Date.UTC(2025, 7, 1, 12));

describe('toCellValue', () => {
  it('should tag numbers, dates and text', () => {
    expect(toCellValue(45870.5)).toEqual({ kind: 'number', value: 45870.5 });
    expect(toCellValue(noon)).toEqual({ kind: 'date', value: noon });
    expect(toCellValue('주이패턴이불')).toEqual({ kind: 'text', value: '주이패턴이불' });
  });

  it('should treat blanks and non-finite numbers as empty', () => {
    expect(toCellValue(null)).toBe(EMPTY_CELL);
    expect(toCellValue(undefined)).toBe(EMPTY_CELL);
    expect(toCellValue('   ')).toBe(EMPTY_CELL);
    expect(toCellValue(Number.NaN)).toBe(EMPTY_CELL);
    expect(toCellValue(new Date(Number.NaN))).toBe(EMPTY_CELL);
    expect(isEmptyCell(toCellValue({ nested: true }))).toBe(true);
  });

  it('should keep booleans as text', () => {
    expect(toCellValue(true)).toEqual({ kind: 'text', value: 'true' });
  });
});

describe('cellToDate', () => {
  it('should decode serials', () => {
    expect(cellToDate({ kind: 'number', value: 45870.5 })).toEqual(noon);
  });

  it('should read numeric text as a serial', () => {
    expect(cellToDate({ kind: 'text', value: ' 45870.5 ' })).toEqual(noon);
  });

  it('should parse timestamp text', () => {
    expect(cellToDate({ kind: 'text', value: '2025-08-01 12:00:00' })).toEqual(noon);
  });

  it('should return null for unreadable cells', () => {
    expect(cellToDate({ kind: 'text', value: '택배요청' })).toBeNull();
    expect(cellToDate(EMPTY_CELL)).toBeNull();
  });
});

describe('cellToSerial', () => {
  it('should give a date cell and a serial cell of the same instant the same key', () => {
    expect(cellToSerial({ kind: 'date', value: noon })).toBe(45870.5);
    expect(cellToSerial({ kind: 'number', value: 45870.5 })).toBe(45870.5);
    expect(cellToSerial({ kind: 'text', value: '2025-08-01 12:00:00' })).toBe(45870.5);
  });

  it('should return null for empty or unreadable cells', () => {
    expect(cellToSerial(EMPTY_CELL)).toBeNull();
    expect(cellToSerial({ kind: 'text', value: 'n/a' })).toBeNull();
  });
});

describe('cellToText / cellToJson', () => {
  it('should render cells as text', () => {
    expect(cellToText({ kind: 'number', value: 2 })).toBe('2');
    expect(cellToText({ kind: 'date', value: noon })).toBe('2025-08-01T12:00:00.000Z');
    expect(cellToText(EMPTY_CELL)).toBe('');
  });

  it('should render cells as JSON values', () => {
    expect(cellToJson({ kind: 'number', value: 45870.5 })).toBe(45870.5);
    expect(cellToJson({ kind: 'text', value: '옵션' })).toBe('옵션');
    expect(cellToJson(EMPTY_CELL)).toBeNull();
  });
});
