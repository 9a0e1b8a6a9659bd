/**
 * Completion provider factory - creates the provider from configuration
 */
import type { CompletionProvider } from '../types/index';
import { GeminiProvider } from './gemini';
import { config } from '../config/index';

/**
 * Creates the Gemini provider from application configuration
 * @returns Provider instance (may be unconfigured when no API key is set)
 */
export function createProvider(): CompletionProvider {
  const { gemini, timeout, generation } = config.ai;
  return new GeminiProvider(gemini.apiKey, gemini.model, gemini.baseUrl, timeout, generation);
}

export { GeminiProvider } from './gemini';
export { BaseAIProvider } from './base';
