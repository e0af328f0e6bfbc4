import { AppError } from '../utils/AppError';

/**
 * An uploaded workbook that cannot be opened: corrupt, not a spreadsheet,
 * or protected with a password.
 */
export class WorkbookReadError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'WorkbookReadError';
    Object.setPrototypeOf(this, WorkbookReadError.prototype);
  }
}

export default WorkbookReadError;
