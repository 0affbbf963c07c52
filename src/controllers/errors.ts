import { Request, Response } from 'express';
import * as z from 'zod';
import { AppError, errorMessage } from '../errors';
import { logger } from '../logger';

// Body-parser style errors carry an HTTP status of their own
const httpStatusOf = (error: unknown): number | null => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
};

// Single place mapping thrown errors to responses (zod -> 400, AppError -> its code, rest -> 500)
export const sendError = (req: Request, res: Response, error: unknown): void => {
  if (res.headersSent) {
    logger.error(req, 'Error after response was sent', { error: errorMessage(error) });
    return;
  }
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation failed', details: error.issues });
    return;
  }
  if (error instanceof AppError) {
    if (error.errorCode >= 500) {
      logger.error(req, 'Request failed', { error: error.message, name: error.name });
    }
    res.status(error.errorCode).json({ error: error.message });
    return;
  }
  const status = httpStatusOf(error);
  if (status !== null) {
    res.status(status).json({ error: errorMessage(error) });
    return;
  }
  logger.error(req, 'Unhandled request error', { error: errorMessage(error) });
  res.status(500).json({ error: 'Internal Server Error' });
};
