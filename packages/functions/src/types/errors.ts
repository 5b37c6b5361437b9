import type { ValidationIssue } from './program.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Base class for failures that abort a program generation run.
 */
export class ProgramGenerationError extends AppError {
  constructor(
    message: string,
    statusCode = 500,
    code = 'PROGRAM_GENERATION_FAILED',
    details?: unknown
  ) {
    super(statusCode, code, message, details);
    this.name = 'ProgramGenerationError';
  }
}

export class ProgramValidationError extends ProgramGenerationError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Program validation failed: ${issues.map((issue) => issue.message).join('; ')}`,
      422,
      'PROGRAM_VALIDATION_FAILED',
      issues
    );
    this.name = 'ProgramValidationError';
    this.issues = issues;
  }
}

export class ProgramPersistenceError extends ProgramGenerationError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'PROGRAM_PERSISTENCE_FAILED');
    this.name = 'ProgramPersistenceError';
    this.cause = cause;
  }
}

/**
 * Raised by a program store when an all-or-nothing create cannot complete.
 */
export class ProgramCreationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ProgramCreationError';
    this.cause = cause;
  }
}

/**
 * Raised when the language model returns output that cannot be used.
 */
export class ExerciseSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExerciseSelectionError';
  }
}
