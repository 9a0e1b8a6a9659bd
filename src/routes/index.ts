export { createGeminiRouter } from './gemini';
export { createGameRouter, UNKNOWN_GAME_ID } from './game';
export { createDiagnosticsRouter, ROOT_MESSAGE } from './diagnostics';
export { handleApiError, createErrorMiddleware } from './errors';
