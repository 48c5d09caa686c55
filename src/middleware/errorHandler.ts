import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { env } from '../config/env';
import { AppError, ServiceError, WhatsAppError } from '../utils/errors';
import { logger } from '../utils/logger';

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    logger.warn('Malformed request body', { path: req.path });
    return res.status(400).json({ success: false, error: 'Malformed JSON body' });
  }

  if (err instanceof multer.MulterError) {
    return res.status(400).json({ success: false, error: err.message });
  }

  logger.error('Request failed', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof WhatsAppError) {
    return res.status(502).json({
      success: false,
      error: 'WhatsApp provider error',
    });
  }

  if (err instanceof ServiceError) {
    return res.status(503).json({
      success: false,
      error: 'Service temporarily unavailable',
    });
  }

  if (err instanceof AppError) {
    return res.status(err.statusCode).json({
      success: false,
      error: err.message,
    });
  }

  const message = env.NODE_ENV === 'production' ? 'Internal server error' : err.message;

  res.status(500).json({
    success: false,
    error: message,
  });
}
