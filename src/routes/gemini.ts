/**
 * Completion route handlers - relay player text through the request dispatcher
 */
import { Router, Request, Response } from 'express';
import { RequestDispatcher } from '../services/dispatcher';
import { LoggerService } from '../services/logger';
import { validateRequestData } from '../utils/validate-request';
import { handleApiError } from './errors';

/**
 * Creates Express router for /gemini_request and /echo
 * @param dispatcher - Request dispatcher
 * @param logger - Logger service for structured logging
 * @param exposeErrorDetail - Include error messages in 500 bodies
 */
export function createGeminiRouter(
  dispatcher: RequestDispatcher,
  logger: LoggerService,
  exposeErrorDetail?: boolean
): Router {
  const router = Router();

  router.post(
    '/gemini_request',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response): Promise<void> => {
      try {
        const validation = validateRequestData(req.body, ['user_input']);
        if (!validation.valid) {
          res.status(400).type('text/plain').send(validation.message);
          return;
        }

        const userInput = validation.body.user_input;
        if (typeof userInput !== 'string') {
          res.status(400).type('text/plain').send('user_input must be a string');
          return;
        }

        const result = await dispatcher.dispatch(userInput);
        res
          .status(result.ok ? 200 : 500)
          .type('text/plain')
          .send(result.text);
      } catch (error) {
        handleApiError(res, logger, error, 'gemini_request processing', exposeErrorDetail);
      }
    }
  );

  router.post('/echo', (req: Request, res: Response): void => {
    const validation = validateRequestData(req.body, ['user_input']);
    if (!validation.valid) {
      res.status(400).type('text/plain').send(validation.message);
      return;
    }

    const userInput = validation.body.user_input;
    const text = typeof userInput === 'string' ? userInput : JSON.stringify(userInput);
    logger.info(`Echoing back: ${text}`);
    res.type('text/plain').send(text);
  });

  return router;
}
