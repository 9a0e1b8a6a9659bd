/**
 * Persona type definitions
 */

/**
 * Which persona frames a request
 */
export type PersonaKind = 'general' | 'round-start';

/**
 * A fixed (system prompt, temperature) pair
 */
export interface PersonaConfig {
  name: string;
  systemPrompt: string;
  temperature: number;
}

/**
 * Parameters declared in a persona file's PARAMETERS section
 */
export interface PersonaParameters {
  temperature?: number;
}

/**
 * Result of parsing a persona markdown file
 */
export interface PersonaData {
  systemPrompt: string;
  parameters: PersonaParameters;
}
