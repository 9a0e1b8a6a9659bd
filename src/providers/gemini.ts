/**
 * Google Gemini provider implementation
 */
import { BaseAIProvider } from './base';
import type { CompletionRequest, CompletionResponse, GenerationDefaults } from '../types/index';

interface GeminiPart {
  text: string;
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

/**
 * generateContent request body
 */
interface GeminiRequestBody {
  contents: GeminiContent[];
  generationConfig: {
    temperature: number;
    topP: number;
    topK: number;
    maxOutputTokens: number;
    responseMimeType?: string;
    responseSchema?: Record<string, unknown>;
  };
  safetySettings?: Array<{ category: string; threshold: string }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Concatenates the text parts of the first candidate
 */
function extractCandidateText(data: Record<string, unknown>): string | null {
  const candidates = data.candidates;
  if (!Array.isArray(candidates) || !isRecord(candidates[0])) {
    return null;
  }
  const content = candidates[0].content;
  if (!isRecord(content) || !Array.isArray(content.parts)) {
    return null;
  }
  const texts = content.parts
    .filter(isRecord)
    .map((part) => part.text)
    .filter((text): text is string => typeof text === 'string');
  return texts.length > 0 ? texts.join('') : null;
}

function readCount(usage: Record<string, unknown>, key: string): number {
  const value = usage[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Gemini provider - implements text completion using the generateContent API
 */
export class GeminiProvider extends BaseAIProvider {
  readonly name = 'Google Gemini';
  private readonly defaults: GenerationDefaults;

  constructor(
    apiKey: string,
    model: string,
    baseUrl: string,
    timeout: number,
    defaults: GenerationDefaults
  ) {
    super({ apiKey, model, baseUrl, timeout });
    this.defaults = defaults;
  }

  protected authHeaders(): Record<string, string> {
    return { 'x-goog-api-key': this.config.apiKey };
  }

  /**
   * Builds the request body; the system prompt travels as the first part of the user turn
   */
  buildRequestBody(request: CompletionRequest): GeminiRequestBody {
    const parts: GeminiPart[] = [];
    if (request.systemPrompt) {
      parts.push({ text: request.systemPrompt });
    }
    parts.push({ text: request.userText });

    const body: GeminiRequestBody = {
      contents: [{ role: 'user', parts }],
      generationConfig: {
        temperature: request.temperature,
        topP: request.topP ?? this.defaults.topP,
        topK: request.topK ?? this.defaults.topK,
        maxOutputTokens: request.maxOutputTokens ?? this.defaults.maxOutputTokens,
      },
    };

    if (request.responseMimeType) {
      body.generationConfig.responseMimeType = request.responseMimeType;
    }
    if (request.responseSchema) {
      body.generationConfig.responseSchema = request.responseSchema;
    }
    if (request.safetySettings) {
      body.safetySettings = request.safetySettings;
    }
    return body;
  }

  /**
   * Sends a completion request to the Gemini API
   */
  async generate(request: CompletionRequest): Promise<CompletionResponse> {
    const endpoint = `/models/${encodeURIComponent(this.config.model)}:generateContent`;
    const data = await this.makeRequest(endpoint, this.buildRequestBody(request));
    return this.parseResponse(data);
  }

  /**
   * Parses a generateContent response
   */
  protected parseResponse(data: unknown): CompletionResponse {
    if (!isRecord(data)) {
      throw new Error('Unable to parse AI response format');
    }

    const content = extractCandidateText(data);
    if (content === null) {
      throw new Error('Unable to parse AI response format');
    }

    const usage = data.usageMetadata;
    return {
      content,
      usage: isRecord(usage)
        ? {
            promptTokens: readCount(usage, 'promptTokenCount'),
            completionTokens: readCount(usage, 'candidatesTokenCount'),
            totalTokens: readCount(usage, 'totalTokenCount'),
          }
        : undefined,
    };
  }
}
