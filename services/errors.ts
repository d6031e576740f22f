export type ErrorCode = 'INPUT' | 'GENERATION_FAILED' | 'SYNTHESIS_FAILED' | 'NOTHING_TO_EDIT';

/**
 * Base error for everything surfaced to users. `message` is safe to show;
 * the underlying failure, if any, rides along as `cause` for operators.
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }

  static fromUnknown(error: unknown, fallback: ErrorCode = 'SYNTHESIS_FAILED'): AppError {
    if (error instanceof AppError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new AppError(fallback, message, { cause: error });
  }
}

export class InputError extends AppError {
  constructor(message: string) {
    super('INPUT', message);
    this.name = 'InputError';
  }
}

export type GenerationFailureReason = 'schemaInvalid';

export class GenerationFailedError extends AppError {
  readonly reason: GenerationFailureReason;
  readonly attempts: number;

  constructor(reason: GenerationFailureReason, attempts: number, cause?: unknown) {
    super(
      'GENERATION_FAILED',
      `The text model did not return a valid dialogue after ${attempts} attempt${attempts === 1 ? '' : 's'}.`,
      { cause }
    );
    this.name = 'GenerationFailedError';
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class SynthesisError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('SYNTHESIS_FAILED', message, { cause });
    this.name = 'SynthesisError';
  }
}

export class NothingToEditError extends AppError {
  constructor(action: string) {
    super('NOTHING_TO_EDIT', `Nothing to ${action} yet. Generate a dialogue first.`);
    this.name = 'NothingToEditError';
  }
}

// Raised when model output is not a valid dialogue; the generator retries on it
export class SchemaValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaValidationError';
  }
}
