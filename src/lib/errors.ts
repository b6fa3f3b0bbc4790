export type QuizReasonCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_SOURCE'
  | 'INSUFFICIENT_QUESTIONS'
  | 'ACCESS_DENIED';

export class QuizError extends Error {
  readonly reasonCode: QuizReasonCode;

  constructor(reasonCode: QuizReasonCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.reasonCode = reasonCode;
  }
}

export class SourceUnavailableError extends QuizError {
  constructor(readonly path: string, options?: ErrorOptions) {
    super('SOURCE_UNAVAILABLE', `Question file is unavailable: ${path}`, options);
  }
}

export class MalformedSourceError extends QuizError {
  constructor(readonly missingColumns: string[]) {
    super(
      'MALFORMED_SOURCE',
      `Question file is missing required columns: ${missingColumns.join(', ')}`
    );
  }
}

export class InsufficientQuestionsError extends QuizError {
  constructor(readonly found: number, readonly required: number) {
    super(
      'INSUFFICIENT_QUESTIONS',
      `Question file has ${found} valid questions, at least ${required} required`
    );
  }
}

export class AccessDeniedError extends QuizError {
  constructor() {
    super('ACCESS_DENIED', 'Access denied');
  }
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}
