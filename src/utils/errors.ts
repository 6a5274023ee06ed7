// ============================================
// Engine error taxonomy
// ============================================
// Services throw these; only the HTTP layer decides which status each maps to.

export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  STORE_FAILURE: 'STORE_FAILURE',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface FieldIssue {
  field: string;
  message: string;
}

export abstract class EngineError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends EngineError {
  readonly code = ErrorCode.VALIDATION_ERROR;

  constructor(message: string, public readonly details: FieldIssue[] = []) {
    super(message);
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError(message, [{ field, message }]);
  }
}

export class NotFoundError extends EngineError {
  readonly code = ErrorCode.NOT_FOUND;

  constructor(public readonly entityType: string, public readonly entityId: number | string) {
    super(`${entityType} not found: ${entityId}`);
  }
}

export class ConflictError extends EngineError {
  readonly code = ErrorCode.CONFLICT;
}

/** Wraps a failure raised by the underlying store; the driver error stays available as `cause`. */
export class StoreFailure extends EngineError {
  readonly code = ErrorCode.STORE_FAILURE;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export const isEngineError = (err: unknown): err is EngineError => err instanceof EngineError;
