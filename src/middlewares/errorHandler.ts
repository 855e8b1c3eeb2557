import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Maps errors raised by middleware (body parser, multer) to AppError.
 */
const toAppError = (err: Error): AppError | null => {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? AppError.payloadTooLarge(`Upload rejected: ${err.message}`)
      : AppError.badRequest(`Upload rejected: ${err.message}`);
  }

  // body-parser sets status on malformed or oversized bodies
  const status = 'status' in err ? err.status : undefined;
  if (status === 413) {
    return AppError.payloadTooLarge('Request body too large');
  }
  if (status === 400) {
    return AppError.badRequest('Malformed request body');
  }

  return null;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = toAppError(err);

  const statusCode = appError?.statusCode ?? 500;
  const isOperational = appError?.isOperational ?? false;
  const message = appError && isOperational ? appError.message : 'Internal Server Error';

  if (!isOperational) {
    logger.error(`Unhandled Error: ${err.stack ?? err.message}`);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

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
