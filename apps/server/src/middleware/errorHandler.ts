import type { NextFunction, Request, Response } from 'express';
import { DatasetError } from '../errors';

interface ErrorResponse {
  error: {
    message: string;
    code: string;
  };
}

/**
 * Maps pipeline errors to their status code; anything else is a 500.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof DatasetError) {
    console.warn(`[API] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    const response: ErrorResponse = { error: { message: err.message, code: err.name } };
    res.status(err.statusCode).json(response);
    return;
  }

  console.error(`[API] ${err.name}: ${err.message}`);
  if (err.stack) console.error(err.stack);
  const response: ErrorResponse = {
    error: {
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR'
    }
  };
  res.status(500).json(response);
}
