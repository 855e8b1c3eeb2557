import { Response } from 'express';
import type { ApiResponse } from '../types';

const envelope = <T>(fields: Omit<ApiResponse<T>, 'timestamp'>): ApiResponse<T> => ({
  ...fields,
  timestamp: new Date().toISOString(),
});

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => res.status(statusCode).json(envelope({ success: true, data, message }));

/**
 * Send an error response
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string
): Response => res.status(statusCode).json(envelope({ success: false, error, message }));
