export type QuizErrorKind =
  | 'EmptyInputRejected'
  | 'TransportFailure'
  | 'IndexOutOfRange'
  | 'NothingToSubmit'
  | 'AlreadyGraded'
  | 'EmptyQuestionSet'
  | 'SessionNotFound'
  | 'GenerationInProgress';

export abstract class QuizError extends Error {
  abstract readonly kind: QuizErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputRejectedError extends QuizError {
  readonly kind = 'EmptyInputRejected';

  constructor() {
    super('Please enter some text content to generate questions.');
  }
}

export class TransportFailureError extends QuizError {
  readonly kind = 'TransportFailure';
}

export class IndexOutOfRangeError extends QuizError {
  readonly kind = 'IndexOutOfRange';

  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super(`Question index ${index} is out of range (0..${length - 1}).`);
  }
}

export class NothingToSubmitError extends QuizError {
  readonly kind = 'NothingToSubmit';

  constructor() {
    super('No question set is loaded, nothing to submit.');
  }
}

export class AlreadyGradedError extends QuizError {
  readonly kind = 'AlreadyGraded';

  constructor() {
    super('This quiz has already been submitted.');
  }
}

export class EmptyQuestionSetError extends QuizError {
  readonly kind = 'EmptyQuestionSet';

  constructor() {
    super('A quiz needs at least one question.');
  }
}

export class SessionNotFoundError extends QuizError {
  readonly kind = 'SessionNotFound';

  constructor(readonly sessionId: string) {
    super(`Quiz session "${sessionId}" was not found.`);
  }
}

export class GenerationInProgressError extends QuizError {
  readonly kind = 'GenerationInProgress';

  constructor(readonly sessionId: string) {
    super(`A quiz is already being generated for session "${sessionId}".`);
  }
}
