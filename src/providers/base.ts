/**
 * Base class for completion providers - provides common functionality for HTTP requests with timeout
 */
import type {
  AIProviderConfig,
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
} from '../types/index';

/**
 * Abstract base class for completion provider implementations
 * Handles HTTP requests, timeouts, and common provider logic
 */
export abstract class BaseAIProvider implements CompletionProvider {
  abstract readonly name: string;
  protected readonly config: AIProviderConfig;

  constructor(config: AIProviderConfig) {
    this.config = config;
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Checks if provider is properly configured (has API key)
   */
  get isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Performs fetch request with timeout using AbortController
   */
  protected async fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeout: number
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Headers carrying the provider's credentials
   */
  protected abstract authHeaders(): Record<string, string>;

  /**
   * Makes authenticated POST request to the provider API
   * Handles errors and JSON parsing
   */
  protected async makeRequest(endpoint: string, body: unknown): Promise<unknown> {
    if (!this.isConfigured) {
      throw new Error(`Provider ${this.name} is not configured. Missing API key.`);
    }

    const url = `${this.config.baseUrl}${endpoint}`;
    const response = await this.fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.authHeaders(),
        },
        body: JSON.stringify(body),
      },
      this.config.timeout
    );

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      throw new Error(`HTTP ${response.status} ${response.statusText}: ${errorText}`);
    }

    const data: unknown = await response.json();
    return data;
  }

  /**
   * Sends a completion request and returns the generated text
   */
  abstract generate(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Parses provider-specific response format into standard format
   */
  protected abstract parseResponse(data: unknown): CompletionResponse;
}
