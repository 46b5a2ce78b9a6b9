import { Injectable, Logger } from '@nestjs/common';
import { GenerateQuizDto } from './dto/generate-quiz.dto';
import {
  EmptyInputRejectedError,
  GenerationInProgressError,
} from './errors/quiz.errors';
import { QuizGeneratorService } from './quiz-generator.service';
import { QuizSessionStore } from './quiz-session.store';
import type {
  GenerationOutcome,
  OptionKey,
  QuizResponse,
  QuizResult,
  QuizView,
} from './types/quiz-question.interface';

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);
  private readonly generating = new Set<string>();

  constructor(
    private readonly generator: QuizGeneratorService,
    private readonly sessionStore: QuizSessionStore,
  ) {}

  async createQuiz(dto: GenerateQuizDto): Promise<QuizResponse> {
    const outcome = await this.generate(dto);
    const { sessionId, session } = this.sessionStore.create();
    session.load(outcome.questions);
    this.logger.log(
      `Session ${sessionId} loaded ${outcome.questions.length} questions (${outcome.source})`,
    );

    return {
      sessionId,
      source: outcome.source,
      notice: outcome.notice,
      quiz: session.toView(),
    };
  }

  /** Replaces the questions of an existing session, discarding its answers. */
  async regenerateQuiz(
    sessionId: string,
    dto: GenerateQuizDto,
  ): Promise<QuizResponse> {
    this.sessionStore.get(sessionId);
    if (this.generating.has(sessionId)) {
      throw new GenerationInProgressError(sessionId);
    }

    this.generating.add(sessionId);
    let outcome: GenerationOutcome;
    try {
      outcome = await this.generate(dto);
    } finally {
      this.generating.delete(sessionId);
    }

    // The session may have been discarded while the call was in flight.
    const session = this.sessionStore.get(sessionId);
    session.load(outcome.questions);
    this.logger.log(
      `Session ${sessionId} reloaded with ${outcome.questions.length} questions (${outcome.source})`,
    );

    return {
      sessionId,
      source: outcome.source,
      notice: outcome.notice,
      quiz: session.toView(),
    };
  }

  getQuiz(sessionId: string): QuizView {
    return this.sessionStore.get(sessionId).toView();
  }

  selectAnswer(sessionId: string, index: number, option: OptionKey): QuizView {
    const session = this.sessionStore.get(sessionId);
    session.selectAnswer(index, option);
    return session.toView();
  }

  submitQuiz(sessionId: string): QuizResult {
    const result = this.sessionStore.get(sessionId).submit();
    this.logger.log(
      `Session ${sessionId} graded: ${result.score}/${result.total}`,
    );
    return result;
  }

  discardQuiz(sessionId: string): void {
    this.sessionStore.delete(sessionId);
  }

  private async generate(dto: GenerateQuizDto): Promise<GenerationOutcome> {
    const outcome = await this.generator.fetchQuestions(
      dto.text,
      dto.difficulty,
    );
    if (outcome.source === 'rejected') {
      throw new EmptyInputRejectedError();
    }
    return outcome;
  }
}
