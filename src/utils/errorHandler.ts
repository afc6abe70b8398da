import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { DocumentRole, ExtractionFailure } from '../interfaces/domain/DocumentText';
import { logger } from './logger';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

const DOCUMENT_LABELS: Record<DocumentRole, string> = {
  resume: 'resume',
  job_description: 'job description'
};

/**
 * Raised when no extractor could read an uploaded document. Carries every
 * extractor's failure so the caller can tell a broken file from an empty one.
 */
export class DocumentExtractionError extends AppError {
  public readonly document: DocumentRole;
  public readonly failures: ExtractionFailure[];

  constructor(document: DocumentRole, failures: ExtractionFailure[]) {
    const cause = failures.length > 0
      ? failures.map(failure => `${failure.extractor}: ${failure.message}`).join('; ')
      : 'no extractor available';
    super(`Error reading ${DOCUMENT_LABELS[document]}: ${cause}`, 422);
    this.document = document;
    this.failures = failures;
  }
}

export const handleError = (err: Error, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof DocumentExtractionError) {
    logger.warn('Document extraction failed', { document: err.document, failures: err.failures });
    return res.status(err.statusCode).json({
      error: err.message,
      document: err.document,
      failures: err.failures
    });
  }

  if (err instanceof AppError) {
    logger.error('Application error', { message: err.message, statusCode: err.statusCode });
    return res.status(err.statusCode).json({
      error: err.message
    });
  }

  if (err instanceof multer.MulterError) {
    const statusCode = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    logger.warn('Upload rejected', { code: err.code, field: err.field });
    return res.status(statusCode).json({
      error: err.message
    });
  }

  // Log unexpected errors
  logger.error('Unexpected error', { message: err.message, stack: err.stack });

  res.status(500).json({
    error: 'Internal server error'
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Route not found'
  });
};
