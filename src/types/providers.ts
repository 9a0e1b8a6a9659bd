/**
 * Completion provider type definitions and interfaces
 */

/**
 * Configuration required for provider initialization
 */
export interface AIProviderConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeout: number;
}

/**
 * Sampling defaults applied when a request does not override them
 */
export interface GenerationDefaults {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

/**
 * Harm category threshold passed through to the model
 */
export interface SafetySetting {
  category: string;
  threshold: string;
}

/**
 * A single text-completion request
 */
export interface CompletionRequest {
  systemPrompt?: string;
  userText: string;
  temperature: number;
  topP?: number;
  topK?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
  responseSchema?: Record<string, unknown>;
  safetySettings?: SafetySetting[];
}

/**
 * Standardized response format from providers
 */
export interface CompletionResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Remote text-completion capability
 */
export interface CompletionProvider {
  readonly name: string;
  readonly model: string;
  readonly isConfigured: boolean;
  generate(request: CompletionRequest): Promise<CompletionResponse>;
}
