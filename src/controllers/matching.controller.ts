import { Request, Response } from 'express';
import { batchService, matchingService } from '../services';
import type { BatchEntry } from '../services';
import { AppError, Logging, asyncHandler, sendSuccess } from '../utils';

export interface PreviewRequestBody {
  receipt: unknown;
  rows: Array<Record<string, unknown>>;
}

export interface BatchRequestBody {
  entries: BatchEntry[];
}

/**
 * Matching controller
 */
export class MatchingController {
  /**
   * POST /matching/preview
   * Runs the cascade over posted rows without writing anything
   */
  preview = asyncHandler((req: Request, res: Response): void => {
    const body: PreviewRequestBody = req.body;
    const settings = batchService.batchSettingsFromEnv();

    const preview = matchingService.previewMatch(body.receipt, body.rows, settings.options);
    const message =
      preview.status === 'matched'
        ? `${preview.candidateCount} matching order(s) found`
        : 'No matching order was found';

    sendSuccess(res, preview, message);
  });

  /**
   * POST /matching/batch
   * Matches every entry against the uploaded workbook and returns the result file
   */
  batch = asyncHandler((req: Request, res: Response): void => {
    if (!req.file) {
      Logging.warn('Batch rejected: no workbook uploaded');
      throw AppError.badRequest('No file uploaded. Please upload the order workbook (.xlsx).');
    }

    const body: BatchRequestBody = req.body;
    const { originalname, size, buffer } = req.file;
    Logging.info(`Workbook received: ${originalname} (${(size / 1024).toFixed(2)} KB), ${body.entries.length} entries`);

    const result = batchService.runBatchOnWorkbook(buffer, body.entries, batchService.batchSettingsFromEnv());

    sendSuccess(
      res,
      {
        summary: result.summary,
        filter: result.filter,
        convertedCells: result.convertedCells,
        file: {
          name: result.fileName,
          mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
          // Only worth downloading when at least one order was written
          content: result.summary.succeeded > 0 ? result.workbook.toString('base64') : null,
        },
      },
      `Batch processed: ${result.summary.succeeded} of ${result.summary.total} matched`
    );
  });
}

export const matchingController = new MatchingController();

export default matchingController;
