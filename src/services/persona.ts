/**
 * Persona service - loads the general and round-start personas from markdown files
 */
import path from 'path';
import { existsSync } from 'fs';
import { readFile, readdir } from 'fs/promises';
import type { PersonaConfig, PersonaKind } from '../types/index';
import { parsePersonaContent } from '../utils/persona-parser';

export const ROUND_START_TEMPERATURE = 0.25;

export interface PersonaFiles {
  general: string;
  roundStart: string;
}

/**
 * Holds the two fixed personas used by the dispatcher
 */
export class PersonaService {
  private readonly personasDir: string;
  private readonly defaultTemperature: number;
  private personas: Partial<Record<PersonaKind, PersonaConfig>> = {};

  constructor(personasDir: string, defaultTemperature: number) {
    this.personasDir = personasDir;
    this.defaultTemperature = defaultTemperature;
  }

  /**
   * Loads a single persona file
   * @param filename - Name of the persona file (e.g., "seraph.md")
   * @param defaultTemperature - Used when the file declares no temperature
   * @throws Error if file doesn't exist or has no system prompt
   */
  async loadPersona(
    filename: string,
    defaultTemperature: number = this.defaultTemperature
  ): Promise<PersonaConfig> {
    const filePath = path.join(this.personasDir, filename);

    if (!existsSync(filePath)) {
      throw new Error(`Persona file not found: ${filePath}`);
    }

    const content = await readFile(filePath, 'utf-8');
    const parsed = parsePersonaContent(content);

    if (!parsed.systemPrompt) {
      throw new Error(`Persona file is empty: ${filePath}`);
    }

    return {
      name: filename.replace(/\.md$/, ''),
      systemPrompt: parsed.systemPrompt,
      temperature: parsed.parameters.temperature ?? defaultTemperature,
    };
  }

  /**
   * Loads both personas; replaces any previously loaded pair
   * The round-start persona falls back to ROUND_START_TEMPERATURE rather than the general default
   */
  async loadAll(files: PersonaFiles): Promise<void> {
    const [general, roundStart] = await Promise.all([
      this.loadPersona(files.general),
      this.loadPersona(files.roundStart, ROUND_START_TEMPERATURE),
    ]);
    this.personas = { general, 'round-start': roundStart };
  }

  /**
   * Gets a loaded persona
   * @throws Error if loadAll has not completed
   */
  get(kind: PersonaKind): PersonaConfig {
    const persona = this.personas[kind];
    if (!persona) {
      throw new Error(`No ${kind} persona loaded`);
    }
    return persona;
  }

  /**
   * Lists persona files available in the personas directory
   */
  async listPersonas(): Promise<string[]> {
    if (!existsSync(this.personasDir)) {
      return [];
    }
    const files = await readdir(this.personasDir);
    return files.filter((file) => file.endsWith('.md')).sort();
  }
}
