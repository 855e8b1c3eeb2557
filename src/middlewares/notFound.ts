import { Request, Response } from 'express';
import { sendError } from '../utils';

/**
 * 404 for anything no router claimed
 */
export const notFound = (req: Request, res: Response): void => {
  sendError(res, 'Route not found', 404, `${req.method} ${req.originalUrl} does not exist`);
};

export default notFound;
