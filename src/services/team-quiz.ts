/**
 * Team quiz service - generates personality-quiz questions that sort players into teams
 */
import { readFileSync } from 'fs';
import type {
  AnswerChoice,
  CompletionProvider,
  QuizData,
  QuizQuestion,
  QuizResult,
  SafetySetting,
  TeamDefinition,
} from '../types/index';
import { LoggerService } from './logger';

export const MIN_TEAMS = 2;
export const MAX_TEAMS = 4;

const QUIZ_TEMPERATURE = 0.65;
const QUIZ_TOP_P = 0.9;
const QUIZ_MAX_OUTPUT_TOKENS = 1500;

const SAFETY_SETTINGS: SafetySetting[] = [
  { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_LOW_AND_ABOVE' },
  { category: 'HARM_CATEGORY_HATE_SPEECH', threshold: 'BLOCK_LOW_AND_ABOVE' },
  { category: 'HARM_CATEGORY_SEXUALLY_EXPLICIT', threshold: 'BLOCK_LOW_AND_ABOVE' },
  { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', threshold: 'BLOCK_LOW_AND_ABOVE' },
  { category: 'HARM_CATEGORY_CIVIC_INTEGRITY', threshold: 'BLOCK_NONE' },
];

/**
 * Team definitions and the fixed fallback questions
 */
export interface TeamCatalog {
  questions: string[];
  teams: Record<string, TeamDefinition>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validates parsed catalog JSON
 * @throws Error if a team lacks a fallback answer for every question
 */
export function parseTeamCatalog(data: unknown): TeamCatalog {
  if (!isRecord(data) || !isStringArray(data.questions) || !isRecord(data.teams)) {
    throw new Error('Team catalog must have "questions" and "teams"');
  }

  const questions = data.questions;
  const teams: Record<string, TeamDefinition> = {};
  for (const [name, team] of Object.entries(data.teams)) {
    if (!isRecord(team) || !isStringArray(team.traits) || !isStringArray(team.fallbackAnswers)) {
      throw new Error(`Team ${name} must have "traits" and "fallbackAnswers"`);
    }
    if (team.fallbackAnswers.length !== questions.length) {
      throw new Error(`Team ${name} needs ${questions.length} fallback answers`);
    }
    teams[name] = { traits: team.traits, fallbackAnswers: team.fallbackAnswers };
  }

  return { questions, teams };
}

export const TEAMS_FILE = new URL('../../data/teams.json', import.meta.url);
export const QUIZ_SCHEMA_FILE = new URL('../../data/quiz-response-schema.json', import.meta.url);

function readJsonFile(fileUrl: URL): unknown {
  const parsed: unknown = JSON.parse(readFileSync(fileUrl, 'utf-8'));
  return parsed;
}

/**
 * Loads the team catalog from data/teams.json
 */
export function loadTeamCatalog(fileUrl: URL = TEAMS_FILE): TeamCatalog {
  return parseTeamCatalog(readJsonFile(fileUrl));
}

/**
 * Loads the structured-output schema sent with quiz requests
 */
export function loadQuizSchema(fileUrl: URL = QUIZ_SCHEMA_FILE): Record<string, unknown> {
  const schema = readJsonFile(fileUrl);
  if (!isRecord(schema)) {
    throw new Error(`Quiz schema must be a JSON object: ${fileUrl.pathname}`);
  }
  return schema;
}

function parseAnswerChoice(value: unknown, allowed: Set<string>): AnswerChoice | null {
  if (
    !isRecord(value) ||
    typeof value.choice_text !== 'string' ||
    typeof value.corresponding_category !== 'string' ||
    !allowed.has(value.corresponding_category)
  ) {
    return null;
  }
  return { choice_text: value.choice_text, corresponding_category: value.corresponding_category };
}

/**
 * Checks a model reply against the quiz shape: one choice per selected team on every question
 * @returns null when the reply is not usable
 */
export function parseQuizData(value: unknown, teams: string[]): QuizData | null {
  if (!isRecord(value) || !Array.isArray(value.questions) || value.questions.length === 0) {
    return null;
  }

  const allowed = new Set(teams);
  const questions: QuizQuestion[] = [];
  for (const item of value.questions) {
    if (!isRecord(item) || typeof item.question_text !== 'string' || !Array.isArray(item.answer_choices)) {
      return null;
    }
    const choices: AnswerChoice[] = [];
    for (const raw of item.answer_choices) {
      const choice = parseAnswerChoice(raw, allowed);
      if (!choice) {
        return null;
      }
      choices.push(choice);
    }
    if (choices.length !== teams.length) {
      return null;
    }
    questions.push({ question_text: item.question_text, answer_choices: choices });
  }

  return { questions };
}

export class TeamQuizService {
  private readonly provider: CompletionProvider;
  private readonly catalog: TeamCatalog;
  private readonly responseSchema: Record<string, unknown>;
  private readonly logger: LoggerService;

  constructor(
    provider: CompletionProvider,
    catalog: TeamCatalog,
    responseSchema: Record<string, unknown>,
    logger: LoggerService
  ) {
    this.provider = provider;
    this.catalog = catalog;
    this.responseSchema = responseSchema;
    this.logger = logger;
  }

  /**
   * Names of every known team, in catalog order
   */
  getTeamNames(): string[] {
    return Object.keys(this.catalog.teams);
  }

  private hasTeam(team: string): boolean {
    return Object.hasOwn(this.catalog.teams, team);
  }

  /**
   * Builds the quiz prompt for the selected teams
   */
  createTeamPrompt(selectedTeams: string[]): string {
    const descriptions = selectedTeams
      .filter((team) => this.hasTeam(team))
      .map((team) => `${team} (${this.catalog.teams[team].traits.join(', ')})`);
    const count = selectedTeams.length;

    return [
      `Generate ${this.catalog.questions.length} short, fun, personality-quiz style questions for players aged 8-18 in an online game.`,
      `Each question must have exactly ${count} answer choices, one for each of these team personalities:`,
      descriptions.join('; '),
      '',
      'Requirements:',
      '1. Questions are brief, clear and age-appropriate.',
      '2. Each answer choice corresponds to exactly one team from the list.',
      `3. corresponding_category is always one of: ${selectedTeams.join(', ')}`,
      `4. Every question has exactly ${count} answer choices.`,
      '5. Draw on things young players relate to: hobbies, school, friends, games.',
      '6. Focus on personality traits, preferences and situations.',
      '7. Use simple language and avoid mature themes or abstract concepts.',
      '',
      `Return exactly ${this.catalog.questions.length} questions in the specified JSON format.`,
    ].join('\n');
  }

  /**
   * Canned questions answered by each selected team's fallback answers
   */
  getFallbackQuestions(selectedTeams: string[]): QuizData {
    let teams = selectedTeams.filter((team) => this.hasTeam(team));
    if (teams.length < MIN_TEAMS) {
      teams = this.getTeamNames().slice(0, MAX_TEAMS);
    } else if (teams.length > MAX_TEAMS) {
      teams = teams.slice(0, MAX_TEAMS);
    }

    return {
      questions: this.catalog.questions.map((questionText, index) => ({
        question_text: questionText,
        answer_choices: teams.map((team) => ({
          choice_text: this.catalog.teams[team].fallbackAnswers[index],
          corresponding_category: team,
        })),
      })),
    };
  }

  /**
   * Asks the provider for quiz questions, falling back to canned questions on any failure
   */
  async generateQuiz(selectedTeams: string[]): Promise<{ quizData: QuizData; usingFallback: boolean }> {
    if (!this.provider.isConfigured) {
      this.logger.warn('Quiz provider not configured, using fallback questions');
      return { quizData: this.getFallbackQuestions(selectedTeams), usingFallback: true };
    }

    try {
      const response = await this.provider.generate({
        userText: this.createTeamPrompt(selectedTeams),
        temperature: QUIZ_TEMPERATURE,
        topP: QUIZ_TOP_P,
        maxOutputTokens: QUIZ_MAX_OUTPUT_TOKENS,
        responseMimeType: 'application/json',
        responseSchema: this.responseSchema,
        safetySettings: SAFETY_SETTINGS,
      });

      const parsed: unknown = JSON.parse(response.content);
      const quizData = parseQuizData(parsed, selectedTeams);
      if (!quizData) {
        this.logger.warn('Quiz reply did not match the expected shape, using fallback questions');
        return { quizData: this.getFallbackQuestions(selectedTeams), usingFallback: true };
      }

      this.logger.info(`Generated ${quizData.questions.length} quiz questions`);
      return { quizData, usingFallback: false };
    } catch (error) {
      this.logger.error('Quiz generation failed, using fallback questions', error);
      return { quizData: this.getFallbackQuestions(selectedTeams), usingFallback: true };
    }
  }

  /**
   * Validates requested teams and produces a quiz
   */
  async process(requestedTeams: unknown[]): Promise<QuizResult> {
    const validTeams = requestedTeams.filter(
      (team): team is string => typeof team === 'string' && this.hasTeam(team)
    );

    if (validTeams.length === 0) {
      this.logger.warn(`No valid teams found in request: ${JSON.stringify(requestedTeams)}`);
      return {
        status: 'error',
        message: 'No valid team names provided',
        validTeams: this.getTeamNames(),
      };
    }

    if (validTeams.length < MIN_TEAMS || validTeams.length > MAX_TEAMS) {
      const message = `Invalid number of teams: ${validTeams.length}. Must be ${MIN_TEAMS}-${MAX_TEAMS} teams.`;
      this.logger.warn(message);
      return { status: 'error', message };
    }

    const { quizData, usingFallback } = await this.generateQuiz(validTeams);
    return {
      status: 'success',
      message: usingFallback
        ? 'Quiz questions generated successfully (using fallback questions)'
        : 'Quiz questions generated successfully',
      quizData,
      usingFallback,
    };
  }
}
