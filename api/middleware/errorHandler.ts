import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import type { ErrorResponse } from '../../src/types/annotations';
import { AppError } from '../services/errors';

export function formatZodError(error: ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof AppError) {
    const body: ErrorResponse = { error: err.message };
    res.status(err.status).json(body);
    return;
  }
  if (err instanceof ZodError) {
    const body: ErrorResponse = { error: 'Invalid request', details: formatZodError(err) };
    res.status(400).json(body);
    return;
  }
  if (err instanceof multer.MulterError) {
    const body: ErrorResponse = { error: err.message };
    res.status(400).json(body);
    return;
  }
  if (err instanceof SyntaxError && 'body' in err) {
    const body: ErrorResponse = { error: 'Malformed JSON body' };
    res.status(400).json(body);
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  const body: ErrorResponse = { error: 'Internal server error' };
  res.status(500).json(body);
};
