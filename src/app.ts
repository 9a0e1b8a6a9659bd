/**
 * Express application factory - sets up middleware, routes, and services
 */
import express, { Application } from 'express';
import type { CompletionProvider, SessionStore } from './types/index';
import {
  createDiagnosticsRouter,
  createErrorMiddleware,
  createGameRouter,
  createGeminiRouter,
} from './routes/index';
import {
  LoggerService,
  ThrottleService,
  ResponseCache,
  PersonaService,
  RequestDispatcher,
  PostgresSessionStore,
  TeamQuizService,
  createPool,
  loadTeamCatalog,
  loadQuizSchema,
} from './services/index';
import { createProvider } from './providers/index';
import { config } from './config/index';

/**
 * Container for all application services
 */
export interface AppServices {
  logger: LoggerService;
  provider: CompletionProvider;
  persona: PersonaService;
  cache: ResponseCache;
  throttle: ThrottleService;
  dispatcher: RequestDispatcher;
  store: SessionStore;
  quiz: TeamQuizService;
}

/**
 * Collaborators that may be replaced, e.g. by in-process fakes in tests
 */
export type AppOverrides = Partial<
  Pick<AppServices, 'logger' | 'provider' | 'store' | 'cache' | 'throttle'>
> & {
  personasDir?: string;
  exposeErrorDetail?: boolean;
};

/**
 * Creates and configures the Express application with routes and services
 * @returns Express app instance and service instances
 */
export async function createApp(
  overrides: AppOverrides = {}
): Promise<{ app: Application; services: AppServices }> {
  const app = express();

  app.use(express.json());

  const logger = overrides.logger ?? new LoggerService();
  const provider = overrides.provider ?? createProvider();

  const persona = new PersonaService(
    overrides.personasDir ?? config.persona.personasDir,
    config.ai.generation.temperature
  );
  await persona.loadAll({
    general: config.persona.generalFile,
    roundStart: config.persona.roundStartFile,
  });

  const cache =
    overrides.cache ??
    new ResponseCache({ ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries });
  const throttle = overrides.throttle ?? new ThrottleService(config.throttle.minIntervalMs);
  const dispatcher = new RequestDispatcher(provider, persona, cache, throttle, logger);

  const store =
    overrides.store ??
    new PostgresSessionStore(
      createPool(
        {
          connectionString: config.database.url,
          min: config.database.poolMin,
          max: config.database.poolMax,
        },
        logger
      ),
      logger
    );

  const quiz = new TeamQuizService(provider, loadTeamCatalog(), loadQuizSchema(), logger);

  app.use(createGeminiRouter(dispatcher, logger, overrides.exposeErrorDetail));
  app.use(createGameRouter(store, quiz, logger, overrides.exposeErrorDetail));
  app.use(
    createDiagnosticsRouter({
      store,
      provider,
      throttle,
      cache,
      persona,
      logger,
      poolLimits: { min: config.database.poolMin, max: config.database.poolMax },
      exposeErrorDetail: overrides.exposeErrorDetail,
    })
  );
  app.use(createErrorMiddleware(logger, overrides.exposeErrorDetail));

  return {
    app,
    services: {
      logger,
      provider,
      persona,
      cache,
      throttle,
      dispatcher,
      store,
      quiz,
    },
  };
}
