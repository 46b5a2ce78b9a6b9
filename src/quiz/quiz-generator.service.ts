import { Injectable, Logger } from '@nestjs/common';
import { QuizCompletionClient } from './completion.client';
import { EmptyInputRejectedError } from './errors/quiz.errors';
import { FallbackProvider } from './fallback.provider';
import { PromptBuilder, type QuizGenerationRequest } from './prompt.builder';
import { QUESTIONS_PER_QUIZ } from './quiz.constants';
import { ResponseValidator } from './response.validator';
import type {
  GenerationNotice,
  GenerationOutcome,
  QuizDifficulty,
} from './types/quiz-question.interface';

@Injectable()
export class QuizGeneratorService {
  private readonly logger = new Logger(QuizGeneratorService.name);

  constructor(
    private readonly promptBuilder: PromptBuilder,
    private readonly completionClient: QuizCompletionClient,
    private readonly responseValidator: ResponseValidator,
    private readonly fallbackProvider: FallbackProvider,
  ) {}

  /**
   * Produces a question set for `textContent`. Blank text is rejected with a
   * warning and no questions; every other failure degrades to the
   * placeholder set with an error notice.
   */
  async fetchQuestions(
    textContent: string,
    difficulty: QuizDifficulty,
  ): Promise<GenerationOutcome> {
    let request: QuizGenerationRequest;
    try {
      request = this.promptBuilder.build(textContent, difficulty);
    } catch (error) {
      if (!(error instanceof EmptyInputRejectedError)) {
        throw error;
      }
      this.logger.warn(error.message);
      return {
        questions: [],
        source: 'rejected',
        notice: { level: 'warning', kind: error.kind, message: error.message },
      };
    }

    let raw: string;
    try {
      raw = await this.completionClient.complete(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        'Quiz generation call failed, using placeholder questions.',
        message,
      );
      return this.fallback({
        level: 'error',
        kind: 'TransportFailure',
        message:
          'Error calling the question generator. Using default questions instead.',
        detail: message,
      });
    }

    const validation = this.responseValidator.validate(raw);
    if (!validation.ok) {
      const { kind, detail } = validation.failure;
      this.logger.error(
        `Generated quiz rejected (${kind}), using placeholder questions.`,
        detail,
      );
      return this.fallback({
        level: 'error',
        kind,
        message:
          kind === 'MalformedJSON'
            ? 'Failed to parse the generated quiz as JSON. Using default questions instead.'
            : 'Invalid response structure from the question generator. Using default questions instead.',
        detail,
      });
    }

    if (validation.questions.length !== QUESTIONS_PER_QUIZ) {
      this.logger.warn(
        `Expected ${QUESTIONS_PER_QUIZ} questions, model returned ${
          validation.questions.length
        }.`,
      );
    }

    return { questions: validation.questions, source: 'model', notice: null };
  }

  private fallback(notice: GenerationNotice): GenerationOutcome {
    return {
      questions: this.fallbackProvider.defaultQuestionSet(),
      source: 'fallback',
      notice,
    };
  }
}
