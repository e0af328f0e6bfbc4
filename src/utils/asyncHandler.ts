import { RequestHandler } from 'express';
import type { RouteHandler } from '../types';

/**
 * Adapts a route handler for Express 4: rejected promises and synchronous
 * throws (the workbook parser throws synchronously) both go to `next`.
 */
export const asyncHandler = (fn: RouteHandler): RequestHandler => {
  return (req, res, next) => {
    try {
      Promise.resolve(fn(req, res, next)).catch(next);
    } catch (error) {
      next(error);
    }
  };
};

export default asyncHandler;
