import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { Logger } from 'pino';
import { AppError } from '@/utils/errors';

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

export const createErrorHandler = (logger: Logger): ErrorRequestHandler => {
  return (
    error: Error,
    req: Request,
    res: Response,
    next: NextFunction, // eslint-disable-line @typescript-eslint/no-unused-vars
  ) => {
    if (error instanceof AppError) {
      const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log({ err: error, path: req.path }, 'Request failed');
      res.status(error.statusCode).json({ error: error.message });
      return;
    }
    logger.error({ err: error, path: req.path }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
};
