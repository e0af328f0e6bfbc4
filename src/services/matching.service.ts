/**
 * Matching Preview Service
 *
 * Runs the cascade for a single receipt against rows posted as JSON.
 * Nothing is written: the caller sees which orders would be chosen and why
 * the others were rejected.
 */

import { searchOrders, validateReceipt } from '../matching';
import type { MatchCandidate, MatchDiagnostics, MatchOptions, NoMatchReason } from '../matching';
import { InMemoryOrderTable } from '../spreadsheet';
import { AppError } from '../utils';

export type MatchPreview =
  | {
      status: 'matched';
      best: MatchCandidate;
      candidates: MatchCandidate[];
      candidateCount: number;
      advisory: string | null;
      diagnostics: MatchDiagnostics;
    }
  | {
      status: 'no-match';
      reason: NoMatchReason;
      diagnostics: MatchDiagnostics | null;
    };

/**
 * @throws AppError (400) when the receipt is invalid
 * @throws ColumnNotFoundError when the rows lack an order column
 */
export function previewMatch(
  receipt: unknown,
  records: ReadonlyArray<Record<string, unknown>>,
  options: Partial<MatchOptions> = {}
): MatchPreview {
  const validated = validateReceipt(receipt);
  if (!validated.ok) {
    throw AppError.badRequest(`Receipt data is invalid: ${validated.reason}`);
  }

  const table = InMemoryOrderTable.fromRecords(records);
  const search = searchOrders({ table, options }, validated.value);

  if (!search) {
    return { status: 'no-match', reason: 'no-delivery-orders', diagnostics: null };
  }

  const [best] = search.candidates;
  if (!best) {
    return { status: 'no-match', reason: 'no-candidate', diagnostics: search.diagnostics };
  }

  return {
    status: 'matched',
    best,
    candidates: search.candidates,
    candidateCount: search.candidates.length,
    advisory:
      search.candidates.length > 1
        ? `${search.candidates.length} orders matched; the highest scoring one would be selected`
        : null,
    diagnostics: search.diagnostics,
  };
}

export const matchingService = {
  previewMatch,
};

export default matchingService;
