/**
 * Request dispatcher - filters player text, picks a persona and relays it to the completion provider
 * Round-start announcements are cached and throttled; general queries go straight through
 */
import type { CompletionProvider, DispatchResult, PersonaConfig } from '../types/index';
import { PersonaService } from './persona';
import { ResponseCache } from './response-cache';
import { ThrottleService } from './throttle';
import { LoggerService } from './logger';

export const ROUND_START_PREFIX = 'Round start initiated';
export const GREETING_RESPONSE = 'SERAPH: Greetings.';
export const EXTERNAL_SERVICE_ERROR_TEXT = 'Error communicating with Gemini API';

const TRIVIAL_GREETINGS = new Set(['hi', 'hello', 'hey']);
const TRIVIAL_GREETING_MAX_LENGTH = 5;

/**
 * True for short inputs that are only a greeting word
 */
export function isTrivialGreeting(text: string): boolean {
  return text.length < TRIVIAL_GREETING_MAX_LENGTH && TRIVIAL_GREETINGS.has(text.toLowerCase());
}

/**
 * True when the text announces the start of a game round (case-sensitive prefix)
 */
export function isRoundStart(text: string): boolean {
  return text.startsWith(ROUND_START_PREFIX);
}

export class RequestDispatcher {
  private readonly provider: CompletionProvider;
  private readonly personas: PersonaService;
  private readonly cache: ResponseCache;
  private readonly throttle: ThrottleService;
  private readonly logger: LoggerService;

  constructor(
    provider: CompletionProvider,
    personas: PersonaService,
    cache: ResponseCache,
    throttle: ThrottleService,
    logger: LoggerService
  ) {
    this.provider = provider;
    this.personas = personas;
    this.cache = cache;
    this.throttle = throttle;
    this.logger = logger;
  }

  /**
   * Turns player text into response text
   * @param userText - Untrusted text extracted from the request body
   */
  async dispatch(userText: string): Promise<DispatchResult> {
    const text = userText.trim();

    if (!text) {
      this.logger.info('Blocked empty query, no completion call');
      return { ok: true, text: '', outcome: 'empty' };
    }

    if (isTrivialGreeting(text)) {
      this.logger.info(`Blocked short greeting '${text}', no completion call`);
      return { ok: true, text: GREETING_RESPONSE, outcome: 'greeting' };
    }

    this.logger.info(`Received input: ${text}`);

    if (isRoundStart(text)) {
      return this.dispatchRoundStart(text);
    }

    this.logger.debug('Using general persona');
    return this.complete(this.personas.get('general'), text);
  }

  private async dispatchRoundStart(text: string): Promise<DispatchResult> {
    this.logger.debug('Using round-start persona');

    const cached = this.cache.get(text);
    if (cached !== undefined) {
      this.logger.info(`Serving cached response for: ${text}`);
      return { ok: true, text: cached, outcome: 'cache_hit' };
    }

    const waitedMs = await this.throttle.acquire();
    if (waitedMs > 0) {
      this.logger.info(`Request throttled for ${waitedMs}ms before completion call`);
    }

    const result = await this.complete(this.personas.get('round-start'), text);
    if (result.ok) {
      this.cache.set(text, result.text);
      this.logger.debug(`Cached response for: ${text}`);
    }
    return result;
  }

  private async complete(persona: PersonaConfig, text: string): Promise<DispatchResult> {
    try {
      const response = await this.provider.generate({
        systemPrompt: persona.systemPrompt,
        userText: text,
        temperature: persona.temperature,
      });
      const content = response.content.trim();
      this.logger.info(`Completion (${persona.name}, ${content.length} chars): ${content}`);
      return { ok: true, text: content, outcome: 'completion' };
    } catch (error) {
      this.logger.error(`Error calling ${this.provider.name} (${persona.name})`, error);
      return { ok: false, kind: 'external_service', text: EXTERNAL_SERVICE_ERROR_TEXT };
    }
  }
}
