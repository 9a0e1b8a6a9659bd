/**
 * Route-boundary error handling
 */
import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { LoggerService } from '../services/logger';
import { config } from '../config/index';

/**
 * Logs an unexpected error and answers 500 with a generic body
 * @param context - What the route was doing, for the log line
 */
export function handleApiError(
  res: Response,
  logger: LoggerService,
  error: unknown,
  context: string,
  exposeDetail: boolean = config.server.exposeErrorDetail
): void {
  const detail = error instanceof Error ? error.message : String(error);
  logger.error(`Error during ${context}: ${detail}`, error instanceof Error ? error : undefined);

  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
    detail: exposeDetail ? detail : null,
  });
}

/**
 * Terminal error middleware; body-parser failures become 400, anything else 500
 */
export function createErrorMiddleware(
  logger: LoggerService,
  exposeDetail: boolean = config.server.exposeErrorDetail
): ErrorRequestHandler {
  return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      logger.warn(`Rejected malformed JSON body: ${error.message}`);
      res.status(400).json({ status: 'error', message: 'Malformed JSON in request body' });
      return;
    }
    handleApiError(res, logger, error, 'request handling', exposeDetail);
  };
}
