import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { SessionNotFoundError } from './errors/quiz.errors';
import { DEFAULT_MAX_SESSIONS } from './quiz.constants';
import { QuizSession } from './quiz-session';

/** In-memory sessions, one per quiz taker. Nothing is persisted. */
@Injectable()
export class QuizSessionStore {
  private readonly logger = new Logger(QuizSessionStore.name);
  private readonly sessions = new Map<string, QuizSession>();
  private readonly maxSessions: number;

  constructor(private readonly configService: ConfigService) {
    const configured = Number(
      this.configService.get<string>('QUIZ_MAX_SESSIONS'),
    );
    this.maxSessions =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_MAX_SESSIONS;
  }

  create(): { sessionId: string; session: QuizSession } {
    // Map keeps insertion order, so the first key is the oldest session.
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
      this.logger.debug(`Evicted quiz session ${oldest.value}`);
    }

    const sessionId = uuidv4();
    const session = new QuizSession();
    this.sessions.set(sessionId, session);
    return { sessionId, session };
  }

  get(sessionId: string): QuizSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
  }
}
