/**
 * Constants for the Receipt-Order Matching Engine
 *
 * These values define the behavior of the matching cascade.
 * They are tuned against the sales report export of the POS system
 * (one row per ordered product, timestamps stored as day-serials).
 */

// ============================================
// DAY-SERIAL ENCODING
// ============================================

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Day zero of the 1900 date system, as a UTC timestamp.
 * Serial 1.0 is 1899-12-31 on this epoch, so serials before the leap-bug
 * cutoff are shifted by one day (see LEAP_BUG_WINDOW).
 */
export const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);

/**
 * Range where the day-serial encoding counts the nonexistent 1900-02-29.
 * Dates inside this window are one serial lower than their distance from
 * the epoch; serial 60 is the phantom leap day itself.
 */
export const LEAP_BUG_WINDOW = {
  START_MS: Date.UTC(1900, 0, 1),
  CUTOFF_MS: Date.UTC(1900, 2, 1),
  FIRST_SERIAL: 1,
  PHANTOM_SERIAL: 60,
} as const;

/** Fractional parts closer than this to zero collapse to an integer serial. */
export const SERIAL_INTEGER_EPSILON = 1e-9;

// ============================================
// CASCADE TOLERANCES
// ============================================

/**
 * Maximum distance between the receipt approval time and the order start
 * time. The POS stamps the order a few seconds before the card approval.
 * Boundary inclusive: a 10 second gap still matches.
 */
export const TIME_TOLERANCE_SECONDS = 10;

/**
 * Minimum product-name similarity for the product stage.
 * One differing character in an eight character name (87.5%) passes.
 * Bracketed qualifiers are compared both kept and stripped, see
 * productSimilarity.
 */
export const PRODUCT_SIMILARITY_THRESHOLD = 0.75;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Composite score weights. Date and time are pass/fail stages, so every
 * accepted row already carries DATE + TIME; product similarity decides
 * the ranking. A perfect product match scores exactly 1.0.
 */
export const SCORE_WEIGHTS = {
  DATE: 0.3,
  TIME: 0.3,
  PRODUCT: 0.4,
} as const;

// ============================================
// ORDER TABLE LAYOUT
// ============================================

/**
 * Header names of the sales report columns read by the cascade.
 */
export const ORDER_COLUMNS = {
  ORDER_DATE: '주문기준일자',
  ORDER_TIME: '주문시작시각',
  PRODUCT_NAME: '상품명',
  OPTION: '옵션',
  QUANTITY: '수량',
} as const;

/**
 * Substring identifying the option column when its header carries extra
 * text (e.g. "옵션정보").
 */
export const OPTION_COLUMN_MARKER = '옵션';

/**
 * Recipient columns filled by the customer-info writer.
 */
export const RECIPIENT_COLUMNS = {
  NAME: '수하인명',
  PHONE: '수하인전화번호',
  MOBILE: '수하인핸드폰번호',
  ADDRESS: '수하인주소',
  ITEM_DESCRIPTION: '품목명',
} as const;

/**
 * Columns appended to the filtered sheet when the source report lacks them,
 * in the order the courier upload form expects.
 */
export const DELIVERY_COLUMNS: readonly string[] = [
  RECIPIENT_COLUMNS.NAME,
  RECIPIENT_COLUMNS.ADDRESS,
  RECIPIENT_COLUMNS.PHONE,
  RECIPIENT_COLUMNS.MOBILE,
  '박스수량',
  '택배운임',
  '운임구분',
  RECIPIENT_COLUMNS.ITEM_DESCRIPTION,
  '배송메세지',
];

/**
 * Physical row of table index 0: one header row, one-based rows.
 */
export const HEADER_OFFSET = 2;

// ============================================
// DELIVERY MARKERS
// ============================================

/**
 * Option text fragments marking an item for courier shipment
 * (free delivery for channel subscribers, or an explicit parcel request).
 */
export const DELIVERY_KEYWORDS: readonly string[] = ['채널추가무료배송', '택배요청'];
