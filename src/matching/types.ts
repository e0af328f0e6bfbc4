/**
 * Type Definitions for the Receipt-Order Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic; the only mutable state it touches
 * is the order table handed to the customer-info writer.
 */

// ============================================
// TABLE ACCESS
// ============================================

/**
 * A raw cell, tagged once at the table boundary.
 */
export type CellValue =
  | { kind: 'number'; value: number }
  | { kind: 'date'; value: Date }
  | { kind: 'text'; value: string }
  | { kind: 'empty' };

export type WritableCellValue = string | number;

/**
 * Narrow view of the order sheet used by the engine and the writer.
 *
 * Rows are addressed by table index (0 = first data row below the header);
 * writes take the physical one-based sheet row. Columns are zero-based
 * positions in `headers`.
 */
export interface OrderTable {
  readonly headers: readonly string[];
  readonly rowCount: number;
  /** Column position by exact header name */
  getColumnIndex(name: string): number | undefined;
  getRawCell(index: number, column: number): CellValue;
  setCell(physicalRow: number, column: number, value: WritableCellValue): void;
}

// ============================================
// INPUT TYPES
// ============================================

/**
 * One product line printed on the receipt.
 */
export interface LineItem {
  name: string;
  unitPrice: number | null;
  /** Null when the receipt does not print a quantity (counted as 1) */
  quantity: number | null;
  amount: number | null;
  /** Option text such as "택배요청(0)/민트(0)/Q(20000)" */
  options: string | null;
}

/**
 * Structured receipt produced by the extraction service.
 */
export interface ReceiptRecord {
  /** Approval timestamp, `YYYY-MM-DD HH:MM:SS` or `YYYY-MM-DD` */
  approvedAt: string;
  items: LineItem[];
  /** Merchant and payment fields, opaque to the matcher */
  metadata: Record<string, unknown>;
}

/**
 * Shipping recipient extracted from the customer's message.
 */
export interface CustomerInfo {
  name: string;
  /** Normalized to 010-XXXX-XXXX where possible */
  phone: string;
  address: string;
}

/**
 * One candidate row of the order table, cells kept raw.
 */
export interface OrderRow {
  index: number;
  orderDate: CellValue;
  orderTime: CellValue;
  productName: CellValue;
  option: CellValue;
}

export type FilterMode = 'any' | 'all';

export interface MatchOptions {
  timeToleranceSeconds: number;
  productThreshold: number;
  deliveryKeywords: readonly string[];
  headerOffset: number;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface ProductMatch {
  isMatch: boolean;
  similarity: number;
}

/**
 * A row that passed every cascade stage.
 */
export interface MatchCandidate {
  index: number;
  /** 0.3 (date) + 0.3 (time) + 0.4 × product similarity */
  score: number;
  productSimilarity: number;
  order: {
    orderDate: string | number | null;
    orderTime: string | number | null;
    productName: string;
    option: string | number | null;
  };
}

/**
 * Last stage a row reached in the cascade.
 */
export type CascadeStage = 'guard' | 'date' | 'time' | 'product' | 'accepted';

export type RejectionReason =
  | 'missing-data'
  | 'date-mismatch'
  | 'time-mismatch'
  | 'product-mismatch';

/**
 * Per-row outcome, recorded for every row whether accepted or not.
 */
export interface RowTrace {
  index: number;
  productName: string;
  stage: CascadeStage;
  dateMatch: boolean;
  timeMatch: boolean;
  productMatch: boolean;
  timeDifferenceSeconds?: number;
  productSimilarity?: number;
  score?: number;
  rejection?: RejectionReason;
  detail: string;
}

export interface MatchDiagnostics {
  totalRows: number;
  checkedRows: number;
  datePass: number;
  timePass: number;
  productPass: number;
  receipt: {
    approvedAt: string;
    productName: string;
  };
  attempts: RowTrace[];
}

export interface MatchSearchResult {
  candidates: MatchCandidate[];
  diagnostics: MatchDiagnostics;
}

/**
 * Rows sharing one order start time, i.e. one logical order.
 */
export interface TimeGroup {
  key: number;
  /** Table indices, ascending */
  indices: number[];
}

export type NoMatchReason = 'no-delivery-orders' | 'no-candidate';

/**
 * Result of one match-and-write attempt.
 *
 * Only systemic faults are thrown; everything a batch should survive
 * comes back as one of these.
 */
export type MatchOutcome =
  | {
      status: 'matched';
      best: MatchCandidate;
      candidates: MatchCandidate[];
      candidateCount: number;
      updatedBlocks: number;
      /** Set when more than one row qualified and the best was auto-selected */
      advisory: string | null;
      message: string;
      diagnostics: MatchDiagnostics;
    }
  | {
      status: 'no-match';
      reason: NoMatchReason;
      message: string;
      diagnostics: MatchDiagnostics;
    }
  | {
      status: 'invalid';
      field: 'receipt' | 'customer';
      reason: string;
      message: string;
    };

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; reason: string };
