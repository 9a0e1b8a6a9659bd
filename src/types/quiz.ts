/**
 * Team quiz type definitions
 */

/**
 * Team personality definition loaded from data/teams.json
 */
export interface TeamDefinition {
  traits: string[];
  fallbackAnswers: string[];
}

export interface AnswerChoice {
  choice_text: string;
  corresponding_category: string;
}

export interface QuizQuestion {
  question_text: string;
  answer_choices: AnswerChoice[];
}

export interface QuizData {
  questions: QuizQuestion[];
}

export type QuizResult =
  | {
      status: 'success';
      message: string;
      quizData: QuizData;
      usingFallback: boolean;
    }
  | {
      status: 'error';
      message: string;
      validTeams?: string[];
    };
