/**
 * Product Name Similarity for Receipt-Order Matching
 *
 * Uses the Ratcliff/Obershelp ratio (difflib SequenceMatcher):
 *   ratio = 2·M / (len(a) + len(b))
 * where M is the number of characters in the recursively matched blocks.
 *
 * Works well for Korean product names because it compares characters,
 * not words, and the POS and the receipt printer abbreviate differently:
 * - "주이패턴이불" vs "주이패턴이블" → 0.83 (one syllable differs)
 * - "주이패턴이불" vs "뜨왈주이패턴베개커버" → 0.50 (shared fragment only)
 */

import { SequenceMatcher } from 'difflib';
import { PRODUCT_SIMILARITY_THRESHOLD } from './constants';
import type { ProductMatch } from './types';

/** Bracketed qualifiers such as "(냉감나일론)" or "[특가]". */
const QUALIFIER_PATTERN = /\([^)]*\)|\[[^\]]*\]|\{[^}]*\}|（[^）]*）/g;

/**
 * Lower-cases and removes all whitespace.
 *
 * @example
 * normalizeProductName("Cool Blanket Q") // "coolblanketq"
 */
export function normalizeProductName(input: string): string {
  if (!input) {
    return '';
  }
  return input.toLowerCase().replace(/\s+/g, '');
}

/**
 * Removes bracketed qualifiers, then normalizes.
 *
 * @example
 * stripQualifiers("주이패턴이불(냉감나일론)") // "주이패턴이불"
 */
export function stripQualifiers(input: string): string {
  return normalizeProductName(input.replace(QUALIFIER_PATTERN, ''));
}

/**
 * Ratcliff/Obershelp ratio of two already normalized strings.
 */
function sequenceRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  return new SequenceMatcher(null, a, b).ratio();
}

/**
 * Calculates the similarity between two product names.
 *
 * Strategy:
 * 1. Compare the normalized names directly
 * 2. Compare again with bracketed qualifiers removed from both
 * 3. Return the higher of the two scores
 *
 * @returns Similarity from 0 to 1
 *
 * @example
 * productSimilarity("주이패턴이불", "주이패턴이불") // 1
 * productSimilarity("주이패턴이불(냉감나일론)", "주이패턴이불") // 1
 * productSimilarity("", "주이패턴이불") // 0
 */
export function productSimilarity(a: string, b: string): number {
  const directA = normalizeProductName(a);
  const directB = normalizeProductName(b);
  if (!directA || !directB) {
    return 0;
  }

  const direct = sequenceRatio(directA, directB);
  const withoutQualifiers = sequenceRatio(stripQualifiers(a), stripQualifiers(b));

  return Math.max(direct, withoutQualifiers);
}

/**
 * Decides whether a receipt line and an order row name the same product.
 *
 * @param threshold - Minimum similarity, inclusive
 *
 * @example
 * matchProductName("주이패턴이불", "뜨왈주이패턴베개커버") // { isMatch: false, similarity: 0.5 }
 */
export function matchProductName(
  receiptName: string,
  orderName: string,
  threshold: number = PRODUCT_SIMILARITY_THRESHOLD
): ProductMatch {
  if (!receiptName || !orderName) {
    return { isMatch: false, similarity: 0 };
  }

  const similarity = productSimilarity(receiptName, orderName);
  return { isMatch: similarity >= threshold, similarity };
}

export default productSimilarity;
