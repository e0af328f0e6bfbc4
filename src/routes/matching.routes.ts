/**
 * Matching API Routes
 *
 * These routes handle HTTP concerns only - matching is delegated to services.
 *
 * Endpoints:
 * - POST /preview - Run the cascade over JSON rows (no writes)
 * - POST /batch - Match receipts against an uploaded order workbook
 */

import { Router, Request } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { env } from '../config';
import { matchingController } from '../controllers';
import { validateRequest } from '../middlewares';
import { AppError } from '../utils';
import type { BatchEntry } from '../services';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

const ALLOWED_EXTENSIONS = ['.xlsx', '.xls'];

/**
 * File filter to only accept spreadsheet files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const extensionOk = ALLOWED_EXTENSIONS.some((ext) => file.originalname.toLowerCase().endsWith(ext));

  if (extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only Excel workbooks (.xlsx, .xls) are allowed'));
  }
};

/**
 * Workbooks are kept in memory: they are rewritten and sent back in the
 * same request, nothing is stored on disk.
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_MB * 1024 * 1024,
    files: 1,
  },
});

// ============================================
// Validation Schemas
// ============================================

export const previewBodySchema = z.object({
  receipt: z.unknown(),
  rows: z.array(z.record(z.unknown())).max(10000, 'at most 10000 rows can be previewed'),
});

const batchEntrySchema = z
  .object({
    label: z.string().trim().min(1, 'label must not be empty'),
    receipt: z.unknown(),
    customer: z.unknown(),
  })
  .transform(
    (entry): BatchEntry => ({
      label: entry.label,
      receipt: entry.receipt,
      customer: entry.customer,
    })
  );

/**
 * Multipart text fields arrive as strings: `entries` carries a JSON array.
 */
export const batchBodySchema = z.object({
  entries: z
    .string({ required_error: 'entries is required' })
    .transform((value, ctx) => {
      try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'entries must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(z.array(batchEntrySchema).min(1, 'at least one entry is required')),
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/matching/preview
 * @desc    Find the orders a receipt would match, without writing
 * @access  Public
 *
 * Request:
 * - Content-Type: application/json
 * - Body: { receipt: ReceiptJson, rows: Array<Record<header, value>> }
 *
 * Response:
 * - 200 OK: { status, candidates, diagnostics }
 * - 400 Bad Request: Invalid receipt
 * - 422 Unprocessable Entity: Order columns missing
 */
router.post('/preview', validateRequest({ body: previewBodySchema }), matchingController.preview);

/**
 * @route   POST /api/v1/matching/batch
 * @desc    Match receipts against an order workbook and return the updated file
 * @access  Public
 *
 * Request:
 * - Content-Type: multipart/form-data
 * - Field "file": the sales report workbook
 * - Field "entries": JSON array of { label, receipt, customer }
 *
 * Response:
 * - 200 OK: { summary, filter, file: { name, content (base64) } }
 * - 400 Bad Request: Missing/unreadable workbook, invalid entries
 * - 422 Unprocessable Entity: Order columns missing
 */
router.post(
  '/batch',
  upload.single('file'),
  validateRequest({ body: batchBodySchema }),
  matchingController.batch
);

export default router;
