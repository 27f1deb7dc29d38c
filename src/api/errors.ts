import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { logger } from '../config/logger';
import { AppError, errorMessage } from '../utils/errors';

/** Answer with `{ error, code, details? }` for anything a handler threw. */
export function sendError(res: Response, e: unknown, context: string): void {
  if (e instanceof AppError) {
    const meta = { error: e.message, code: e.code };
    if (e.status >= 500) logger.error(`${context} failed`, meta);
    else logger.warn(`${context} rejected`, meta);

    res.status(e.status).json({
      error: e.message,
      code: e.code,
      ...(e.details !== undefined ? { details: e.details } : {}),
    });
    return;
  }
  logger.error(`${context} failed`, { error: errorMessage(e) });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

/** Last middleware: upload limits, malformed JSON and anything passed to next(err). */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON' });
    return;
  }
  sendError(res, err, 'Request');
}
