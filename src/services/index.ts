export { LoggerService, LogLevel } from './logger';
export { ThrottleService } from './throttle';
export { ResponseCache } from './response-cache';
export { PersonaService } from './persona';
export { RequestDispatcher } from './dispatcher';
export { PostgresSessionStore, createPool } from './session-store';
export { TeamQuizService, loadTeamCatalog, loadQuizSchema } from './team-quiz';
