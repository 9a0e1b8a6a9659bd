/**
 * Persona parsing utilities - splits persona files into system prompt and parameters
 */
import type { PersonaData, PersonaParameters } from '../types/index';

/**
 * Section marker in persona files
 */
const PARAMETERS_MARKER = '---PARAMETERS---';

/**
 * Parses persona file content into system prompt and generation parameters
 * @param content - Raw persona file content
 * @returns Parsed persona data
 */
export function parsePersonaContent(content: string): PersonaData {
  const lines = content.split('\n');
  const markerIndex = lines.findIndex((line) => line.trim() === PARAMETERS_MARKER);

  // No marker: entire content is the system prompt
  if (markerIndex === -1) {
    return {
      systemPrompt: content.trim(),
      parameters: {},
    };
  }

  const systemPrompt = lines.slice(0, markerIndex).join('\n').trim();
  const pairs = parseKeyValuePairs(lines.slice(markerIndex + 1));

  return {
    systemPrompt,
    parameters: toParameters(pairs),
  };
}

/**
 * Parses key:value pairs from lines of text
 * @param lines - Array of lines to parse
 * @returns Record of key-value pairs
 */
export function parseKeyValuePairs(lines: string[]): Record<string, string> {
  const pairs: Record<string, string> = {};

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex > 0) {
      const key = trimmed.substring(0, colonIndex).trim();
      const value = trimmed.substring(colonIndex + 1).trim();

      if (key && value) {
        pairs[key] = value;
      }
    }
  }

  return pairs;
}

/**
 * Picks known parameters; values that are not finite numbers are ignored
 */
function toParameters(pairs: Record<string, string>): PersonaParameters {
  const parameters: PersonaParameters = {};
  const temperature = Number(pairs.temperature);
  if (pairs.temperature !== undefined && Number.isFinite(temperature)) {
    parameters.temperature = temperature;
  }
  return parameters;
}
