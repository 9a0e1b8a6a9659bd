/**
 * Diagnostic route handlers - liveness, configuration and database checks
 */
import { Router, Request, Response } from 'express';
import type { CompletionProvider, SessionStore } from '../types/index';
import { ThrottleService } from '../services/throttle';
import { ResponseCache } from '../services/response-cache';
import { PersonaService } from '../services/persona';
import { LoggerService } from '../services/logger';
import { handleApiError } from './errors';

export const ROOT_MESSAGE = 'Hello, World! SERAPH relay is running.';

export interface DiagnosticsDeps {
  store: SessionStore;
  provider: CompletionProvider;
  throttle: ThrottleService;
  cache: ResponseCache;
  persona: PersonaService;
  logger: LoggerService;
  poolLimits: { min: number; max: number };
  exposeErrorDetail?: boolean;
}

/**
 * Creates Express router for diagnostic endpoints
 */
export function createDiagnosticsRouter(deps: DiagnosticsDeps): Router {
  const { store, provider, throttle, cache, persona, logger } = deps;
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    logger.info(`Root route accessed, database configured: ${store.isConfigured}`);
    res.type('text/plain').send(ROOT_MESSAGE);
  });

  router.get(
    '/debug_info',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (_req: Request, res: Response): Promise<void> => {
      try {
        const [reachable, personas] = await Promise.all([store.ping(), persona.listPersonas()]);
        res.json({
          database: {
            url_configured: store.isConfigured,
            connection_pool: {
              initialized: store.isConfigured,
              min_connections: deps.poolLimits.min,
              max_connections: deps.poolLimits.max,
            },
            query_test: reachable ? 'success' : 'failed',
          },
          ai: {
            provider: provider.name,
            model: provider.model,
            key_configured: provider.isConfigured,
          },
          throttle: throttle.getStatus(),
          cache: cache.getStatus(),
          personas,
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        handleApiError(res, logger, error, 'debug info', deps.exposeErrorDetail);
      }
    }
  );

  router.get(
    '/test_db',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (_req: Request, res: Response): Promise<void> => {
      if (!store.isConfigured) {
        res.status(500).json({ status: 'Database connection failed' });
        return;
      }
      try {
        const columns = await store.describeColumns('games');
        res.json({
          status: 'Database connection successful',
          table_name: 'games',
          columns: columns.map((column) => [column.name, column.dataType]),
        });
      } catch (error) {
        handleApiError(res, logger, error, 'database test', deps.exposeErrorDetail);
      }
    }
  );

  return router;
}
