import {
  AlreadyGradedError,
  EmptyQuestionSetError,
  IndexOutOfRangeError,
  NothingToSubmitError,
} from './errors/quiz.errors';
import {
  OPTION_KEYS,
  type AnswerReview,
  type OptionKey,
  type QuestionSet,
  type QuizResult,
  type QuizState,
  type QuizView,
} from './types/quiz-question.interface';

/**
 * Answer tracking for one quiz.
 *
 * `empty` → `loaded` on {@link load}, `loaded` → `graded` on {@link submit}.
 * Loading a new question set from any state discards previous answers.
 */
export class QuizSession {
  private currentQuestions: QuestionSet = [];
  private currentSelections: (OptionKey | null)[] = [];
  private submitted = false;

  get state(): QuizState {
    if (this.currentQuestions.length === 0) {
      return 'empty';
    }
    return this.submitted ? 'graded' : 'loaded';
  }

  get questions(): QuestionSet {
    return this.currentQuestions;
  }

  get selections(): readonly (OptionKey | null)[] {
    return [...this.currentSelections];
  }

  get isSubmitted(): boolean {
    return this.submitted;
  }

  get result(): QuizResult | null {
    return this.submitted ? this.grade() : null;
  }

  load(questions: QuestionSet): void {
    if (questions.length === 0) {
      throw new EmptyQuestionSetError();
    }
    this.currentQuestions = questions;
    this.currentSelections = questions.map(() => null);
    this.submitted = false;
  }

  selectAnswer(index: number, optionKey: OptionKey): void {
    if (
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.currentQuestions.length
    ) {
      throw new IndexOutOfRangeError(index, this.currentQuestions.length);
    }
    if (this.submitted) {
      throw new AlreadyGradedError();
    }
    this.currentSelections[index] = optionKey;
  }

  /** Grades the quiz. Calling it again once graded returns the same result. */
  submit(): QuizResult {
    if (this.state === 'empty') {
      throw new NothingToSubmitError();
    }
    this.submitted = true;
    return this.grade();
  }

  toView(): QuizView {
    const revealed = this.submitted;
    return {
      state: this.state,
      questions: this.currentQuestions.map((question, index) => ({
        index,
        text: question.text,
        options: OPTION_KEYS.map((key) => ({
          key,
          text: question.options[key],
        })),
        selectedKey: this.currentSelections[index],
        ...(revealed ? { correctKey: question.correctKey } : {}),
      })),
      result: this.result,
    };
  }

  private grade(): QuizResult {
    const answers: AnswerReview[] = this.currentQuestions.map(
      (question, index) => {
        const selectedKey = this.currentSelections[index];
        return {
          index,
          question: question.text,
          selectedKey,
          selectedText: selectedKey ? question.options[selectedKey] : null,
          correctKey: question.correctKey,
          correctText: question.options[question.correctKey],
          isCorrect: selectedKey === question.correctKey,
        };
      },
    );
    const score = answers.filter((answer) => answer.isCorrect).length;
    const total = this.currentQuestions.length;

    return {
      score,
      total,
      percentage: (100 * score) / total,
      answers,
    };
  }
}
