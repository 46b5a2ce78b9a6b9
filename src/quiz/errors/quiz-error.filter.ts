import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { QuizError, type QuizErrorKind } from './quiz.errors';

const STATUS_BY_KIND: Record<QuizErrorKind, HttpStatus> = {
  EmptyInputRejected: HttpStatus.BAD_REQUEST,
  IndexOutOfRange: HttpStatus.BAD_REQUEST,
  EmptyQuestionSet: HttpStatus.BAD_REQUEST,
  SessionNotFound: HttpStatus.NOT_FOUND,
  NothingToSubmit: HttpStatus.CONFLICT,
  AlreadyGraded: HttpStatus.CONFLICT,
  GenerationInProgress: HttpStatus.CONFLICT,
  TransportFailure: HttpStatus.BAD_GATEWAY,
};

export const statusForQuizError = (error: QuizError): HttpStatus =>
  STATUS_BY_KIND[error.kind];

@Catch(QuizError)
export class QuizErrorFilter implements ExceptionFilter<QuizError> {
  private readonly logger = new Logger(QuizErrorFilter.name);

  catch(exception: QuizError, host: ArgumentsHost): void {
    const status = statusForQuizError(exception);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.debug(`${exception.kind}: ${exception.message}`);
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(status).json({
      statusCode: status,
      error: exception.kind,
      message: exception.message,
    });
  }
}
