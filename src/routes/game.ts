/**
 * Game session route handlers - session lifecycle and team quiz
 */
import { randomUUID } from 'crypto';
import { Router, Request, Response } from 'express';
import type { SessionStore } from '../types/index';
import { TeamQuizService } from '../services/team-quiz';
import { LoggerService } from '../services/logger';
import { readStringList, validateRequestData } from '../utils/validate-request';
import { handleApiError } from './errors';

export const UNKNOWN_GAME_ID = 'UNKNOWN_GAME_ID';

/**
 * Creates Express router for game session endpoints
 * @param store - Game session persistence
 * @param quiz - Team quiz generator
 * @param logger - Logger service for structured logging
 * @param exposeErrorDetail - Include error messages in 500 bodies
 * @param generateId - Game id source
 */
export function createGameRouter(
  store: SessionStore,
  quiz: TeamQuizService,
  logger: LoggerService,
  exposeErrorDetail?: boolean,
  generateId: () => string = randomUUID
): Router {
  const router = Router();

  router.post(
    '/game_start_signal',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response): Promise<void> => {
      try {
        const validation = validateRequestData(req.body, ['user_input', 'player_usernames']);
        if (!validation.valid) {
          logger.warn(`game_start_signal: ${validation.message}`);
          res.status(400).json({ status: 'error', message: validation.message });
          return;
        }

        const usernames = readStringList(validation.body.player_usernames);
        if (!usernames) {
          res.status(400).json({ status: 'error', message: 'player_usernames must be a list' });
          return;
        }

        logger.info(`Game start signal received. Usernames: ${usernames.join(', ')}`);
        const gameId = await store.createSession(generateId(), usernames);

        if (!gameId) {
          logger.error('game_start_signal: game record creation failed');
          res.status(500).json({ status: 'error', message: 'Game record creation failed' });
          return;
        }

        logger.info(`game_start_signal: game record created, game_id ${gameId}`);
        res.json({
          status: 'success',
          message: 'Game start signal processed, game record created',
          game_id: gameId,
        });
      } catch (error) {
        handleApiError(res, logger, error, 'game_start_signal processing', exposeErrorDetail);
      }
    }
  );

  router.post(
    '/game_status_update',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response): Promise<void> => {
      try {
        const validation = validateRequestData(req.body, ['game_id', 'player_usernames']);
        if (!validation.valid) {
          res.status(400).json({ status: 'error', message: validation.message });
          return;
        }

        const usernames = readStringList(validation.body.player_usernames);
        const gameId = validation.body.game_id;
        if (!usernames || typeof gameId !== 'string') {
          res.status(400).json({
            status: 'error',
            message: 'game_id must be a string and player_usernames a list',
          });
          return;
        }

        const { success, message } = await store.updateSession(gameId, usernames);
        res.status(success ? 200 : 500).json({ status: success ? 'success' : 'error', message });
      } catch (error) {
        handleApiError(res, logger, error, 'game status update', exposeErrorDetail);
      }
    }
  );

  router.post(
    '/game_cleanup',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response): Promise<void> => {
      try {
        const validation = validateRequestData(req.body, ['game_id']);
        if (!validation.valid) {
          logger.warn(`game_cleanup: ${validation.message}`);
          res.status(400).json({ status: 'error', message: validation.message });
          return;
        }

        const gameId = String(validation.body.game_id);
        logger.info(`game_cleanup: cleanup requested for game_id ${gameId}`);

        if (gameId === UNKNOWN_GAME_ID) {
          logger.info(`game_cleanup: skipping ${UNKNOWN_GAME_ID}`);
          res.json({ status: 'warning', message: `Skipped cleanup for ${UNKNOWN_GAME_ID}` });
          return;
        }

        const deleted = await store.deleteSession(gameId);
        if (!deleted) {
          logger.warn(`game_cleanup: no game found with ID ${gameId}`);
          res.status(404).json({ status: 'warning', message: `No game found with ID: ${gameId}` });
          return;
        }

        logger.info(`game_cleanup: deleted game ${gameId}`);
        res.json({ status: 'success', message: `Game ${gameId} cleaned up successfully` });
      } catch (error) {
        handleApiError(res, logger, error, 'game cleanup', exposeErrorDetail);
      }
    }
  );

  router.post(
    '/team_quiz',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response): Promise<void> => {
      try {
        const validation = validateRequestData(req.body, ['game_id', 'teams']);
        if (!validation.valid) {
          logger.warn(`team_quiz: ${validation.message}`);
          res.status(400).json({ status: 'error', message: validation.message });
          return;
        }

        const gameId = validation.body.game_id;
        const teams = validation.body.teams;
        logger.info(`Team quiz requested for game_id ${String(gameId)}`);

        const result = await quiz.process(Array.isArray(teams) ? teams : []);
        if (result.status === 'error') {
          res.status(400).json({
            status: 'error',
            message: result.message,
            ...(result.validTeams ? { valid_teams: result.validTeams } : {}),
          });
          return;
        }

        res.json({
          status: 'success',
          message: result.message,
          game_id: gameId,
          quiz_data: result.quizData,
          quiz_questions: result.quizData.questions,
          using_fallback: result.usingFallback,
        });
      } catch (error) {
        handleApiError(res, logger, error, 'team quiz data processing', exposeErrorDetail);
      }
    }
  );

  return router;
}
