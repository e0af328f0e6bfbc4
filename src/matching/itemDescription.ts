/**
 * Item description for the courier label ("품목명").
 *
 * Example: two blankets and one pillow cover shipped together
 *   → "총3개) 주이패턴이불 2개/뜨왈베개커버"
 */

import { optionMatches } from './candidateFilter';
import { DELIVERY_KEYWORDS } from './constants';
import type { LineItem } from './types';

const quantityOf = (item: LineItem): number => item.quantity ?? 1;

/**
 * Line items flagged for shipment by their option text.
 */
export function selectDeliveryItems(
  items: readonly LineItem[],
  keywords: readonly string[] = DELIVERY_KEYWORDS
): LineItem[] {
  return items.filter((item) => optionMatches(item.options ?? '', keywords, 'any'));
}

/**
 * Renders the shipped items as "총{total}개) {item}/{item}".
 * An item reads "{name}" for a quantity of 1 and "{name} {n}개" otherwise.
 *
 * @returns '' when no item is flagged for shipment
 *
 * @example
 * formatItemDescription([{ name: '주이패턴이불', quantity: 1, options: '택배요청(0)', ... }])
 * // "총1개) 주이패턴이불"
 */
export function formatItemDescription(
  items: readonly LineItem[],
  keywords: readonly string[] = DELIVERY_KEYWORDS
): string {
  const deliveryItems = selectDeliveryItems(items, keywords);
  if (deliveryItems.length === 0) {
    return '';
  }

  const total = deliveryItems.reduce((sum, item) => sum + quantityOf(item), 0);
  const parts = deliveryItems.map((item) => {
    const quantity = quantityOf(item);
    return quantity === 1 ? item.name : `${item.name} ${quantity}개`;
  });

  return `총${total}개) ${parts.join('/')}`;
}

export default formatItemDescription;
