import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { MAX_IMAGES_PER_REQUEST, MULTI_IMAGE_FIELD } from '@/middleware/upload';
import { AppError, ValidationError } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { logger } from '@/utils/logger';

const MULTER_MESSAGES: Partial<Record<multer.ErrorCode, string>> = {
  LIMIT_FILE_SIZE: 'File too large.',
  LIMIT_UNEXPECTED_FILE: 'Unexpected field name.',
};

// multer reports files beyond the array's maxCount as an unexpected file on that field
function multerMessage(err: multer.MulterError): string {
  if (err.code === 'LIMIT_UNEXPECTED_FILE' && err.field === MULTI_IMAGE_FIELD) {
    return `Too many files. Maximum is ${MAX_IMAGES_PER_REQUEST} files.`;
  }
  return MULTER_MESSAGES[err.code] ?? err.message;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (res.headersSent) {
    return;
  }

  if (err instanceof AppError) {
    logger.debug('request:rejected', {
      method: req.method,
      path: req.originalUrl,
      status: err.statusCode,
      code: err.code,
      correlationId: req.correlationId,
    });
    const fieldErrors = err instanceof ValidationError ? err.errors : undefined;
    res.status(err.statusCode).json(createErrorResponse(err.message, fieldErrors, err.code));
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json(createErrorResponse(multerMessage(err), undefined, 'invalid'));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(createErrorResponse('JSON parse error.', undefined, 'parse_error'));
    return;
  }

  logger.error('request:failed', {
    method: req.method,
    path: req.originalUrl,
    correlationId: req.correlationId,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
}
