/**
 * Input validation for receipts and customer details.
 *
 * Both inputs come from language-model extraction services and are
 * untrusted. Validation never coerces a bad value into a good one; it
 * either returns the normalized record or the reason it was rejected.
 */

import { z, ZodError } from 'zod';
import { tryParseTimestamp } from './serialDate';
import type { CustomerInfo, LineItem, ReceiptRecord, ValidationResult } from './types';

// ============================================
// Phone numbers
// ============================================

/**
 * Formats Korean mobile numbers as 010-XXXX-XXXX (or 01X-XXX-XXXX for the
 * older 10 digit numbers). Anything else is returned unchanged.
 *
 * @example
 * normalizePhone("01012345678") // "010-1234-5678"
 * normalizePhone("0111234567") // "011-123-4567"
 */
export function normalizePhone(phone: string): string {
  if (!phone) {
    return phone;
  }

  const digits = phone.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('010')) {
    return `${digits.slice(0, 3)}-${digits.slice(3, 7)}-${digits.slice(7)}`;
  }
  if (digits.length === 10 && digits.startsWith('01')) {
    return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  return phone;
}

// ============================================
// Schemas
// ============================================

const optionalInteger = z.number().finite().nullable().optional();

export const lineItemSchema = z
  .object({
    name: z.string().nullable().optional(),
    unit_price: optionalInteger,
    quantity: optionalInteger,
    amount: optionalInteger,
    options: z.string().nullable().optional(),
  })
  .transform(
    (item): LineItem => ({
      name: item.name?.trim() ?? '',
      unitPrice: item.unit_price ?? null,
      quantity: item.quantity ?? null,
      amount: item.amount ?? null,
      options: item.options ?? null,
    })
  );

/**
 * Receipt JSON as emitted by the extraction service (snake_case keys).
 * Merchant and payment fields pass through untouched as metadata.
 */
export const receiptSchema = z
  .object({
    approved_at: z
      .string({ required_error: 'approved_at is required' })
      .refine((value) => tryParseTimestamp(value) !== null, {
        message: "approved_at must be 'YYYY-MM-DD HH:MM:SS' or 'YYYY-MM-DD'",
      }),
    items: z.array(lineItemSchema).min(1, 'at least one line item is required'),
  })
  .passthrough()
  .refine((receipt) => receipt.items.length === 0 || receipt.items[0].name.length > 0, {
    message: 'the first line item must have a name',
    path: ['items', 0, 'name'],
  })
  .transform((receipt): ReceiptRecord => {
    const { approved_at: approvedAt, items, ...metadata } = receipt;
    return { approvedAt: approvedAt.trim(), items, metadata };
  });

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`);

export const customerInfoSchema = z
  .object({
    name: requiredText('name'),
    phone: requiredText('phone')
      .regex(/^[\d-]+$/, 'phone may only contain digits and hyphens')
      .refine(
        (phone) => {
          const digits = phone.replace(/\D/g, '').length;
          return digits >= 10 && digits <= 11;
        },
        { message: 'phone must have 10 or 11 digits' }
      ),
    address: requiredText('address'),
  })
  .transform(
    (info): CustomerInfo => ({
      name: info.name,
      phone: normalizePhone(info.phone),
      address: info.address,
    })
  );

// ============================================
// Validators
// ============================================

/**
 * Flattens zod issues into one line: "items.0.name: the first line item must have a name".
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function validateReceipt(input: unknown): ValidationResult<ReceiptRecord> {
  if (input === null || input === undefined) {
    return { ok: false, reason: 'receipt data is missing' };
  }
  const parsed = receiptSchema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, reason: formatZodError(parsed.error) };
}

export function validateCustomerInfo(input: unknown): ValidationResult<CustomerInfo> {
  if (input === null || input === undefined) {
    return { ok: false, reason: 'customer info is missing' };
  }
  const parsed = customerInfoSchema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, reason: formatZodError(parsed.error) };
}
