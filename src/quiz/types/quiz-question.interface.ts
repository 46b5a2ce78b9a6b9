export const OPTION_KEYS = ['a', 'b', 'c', 'd'] as const;

export type OptionKey = (typeof OPTION_KEYS)[number];

export type QuizDifficulty = string;

export interface Question {
  readonly text: string;
  readonly options: Readonly<Record<OptionKey, string>>;
  readonly correctKey: OptionKey;
}

export type QuestionSet = readonly Question[];

export type QuizState = 'empty' | 'loaded' | 'graded';

export interface AnswerReview {
  index: number;
  question: string;
  selectedKey: OptionKey | null;
  selectedText: string | null;
  correctKey: OptionKey;
  correctText: string;
  isCorrect: boolean;
}

export interface QuizResult {
  score: number;
  total: number;
  percentage: number;
  answers: AnswerReview[];
}

export interface OptionView {
  key: OptionKey;
  text: string;
}

export interface QuestionView {
  index: number;
  text: string;
  options: OptionView[];
  selectedKey: OptionKey | null;
  correctKey?: OptionKey;
}

export interface QuizView {
  state: QuizState;
  questions: QuestionView[];
  result: QuizResult | null;
}

export type GenerationSource = 'model' | 'fallback' | 'rejected';

export interface GenerationNotice {
  level: 'warning' | 'error';
  kind: string;
  message: string;
  detail?: string;
}

export interface GenerationOutcome {
  questions: QuestionSet;
  source: GenerationSource;
  notice: GenerationNotice | null;
}

export interface QuizResponse {
  sessionId: string;
  source: GenerationSource;
  notice: GenerationNotice | null;
  quiz: QuizView;
}
