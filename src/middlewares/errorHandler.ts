import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { env } from '../config';

const MULTER_STATUS: Partial<Record<MulterError['code'], number>> = {
  LIMIT_FILE_SIZE: 413,
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;

  // Check if it's our custom AppError
  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
  } else if (err instanceof MulterError) {
    statusCode = MULTER_STATUS[err.code] ?? 400;
    message = `Upload rejected: ${err.message}`;
    isOperational = true;
  } else if (err instanceof ZodError) {
    statusCode = 400;
    message = `Validation failed: ${err.errors.map((issue) => issue.message).join('; ')}`;
    isOperational = true;
  } else if (err instanceof SyntaxError && 'body' in err) {
    // express.json() parse failure
    statusCode = 400;
    message = 'Malformed JSON body';
    isOperational = true;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
