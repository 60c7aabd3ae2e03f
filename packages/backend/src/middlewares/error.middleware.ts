import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ErrorCodes, type ApiErrorBody, type ErrorCode } from '@ccproxy/shared';
import { logger } from '../lib/logger.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

function sendError(res: Response, status: number, error: ApiErrorBody['error']): void {
  const body: ApiErrorBody = { success: false, error };
  res.status(status).json(body);
}

// express.raw 超出 body 限制时抛出的错误
function isPayloadTooLarge(err: Error): boolean {
  return 'type' in err && err.type === 'entity.too.large';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    logger.warn({ code: err.code, statusCode: err.statusCode, details: err.details }, err.message);
  } else {
    logger.error({ err }, 'Error occurred');
  }

  // 流式响应已经开始，只能断开
  if (res.headersSent) {
    res.end();
    return;
  }

  if (err instanceof AppError) {
    sendError(res, err.statusCode, { code: err.code, message: err.message, details: err.details });
  } else if (err instanceof ZodError) {
    sendError(res, 400, {
      code: ErrorCodes.VALIDATION_ERROR,
      message: 'Validation failed',
      details: err.flatten().fieldErrors,
    });
  } else if (isPayloadTooLarge(err)) {
    sendError(res, 413, { code: ErrorCodes.DECODE_ERROR, message: 'Request body too large' });
  } else {
    sendError(res, 500, { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal server error' });
  }
}
