/**
 * Learning Facts Module - Domain Errors
 *
 * Every failure surfaces as its own discriminated kind; none are collapsed.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Target user does not exist.
 */
export interface NotFoundError {
  readonly type: 'NotFoundError';
  readonly message: string;
  readonly userId: number;
}

/**
 * Caller does not own the target user.
 */
export interface ForbiddenError {
  readonly type: 'ForbiddenError';
  readonly message: string;
  readonly userId: number;
}

/**
 * Fact input is malformed (e.g. empty content).
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
}

/**
 * Query argument outside its accepted range.
 */
export interface InvalidArgumentError {
  readonly type: 'InvalidArgumentError';
  readonly message: string;
  readonly argument: string;
}

/**
 * User store read or write failed.
 */
export interface StorageFailureError {
  readonly type: 'StorageFailureError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Concurrent appends kept winning the row; this append gave up.
 */
export interface BusyError {
  readonly type: 'BusyError';
  readonly message: string;
  readonly retryable: boolean;
  readonly attempts: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Union of all learning facts errors.
 */
export type LearningFactsError =
  | NotFoundError
  | ForbiddenError
  | ValidationError
  | InvalidArgumentError
  | StorageFailureError
  | BusyError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNotFoundError = (userId: number): NotFoundError => ({
  type: 'NotFoundError',
  message: `User ${String(userId)} not found`,
  userId,
});

export const createForbiddenError = (userId: number): ForbiddenError => ({
  type: 'ForbiddenError',
  message: "Forbidden: cannot access other user's data",
  userId,
});

export const createValidationError = (field: string, message: string): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
});

export const createInvalidArgumentError = (
  argument: string,
  message: string
): InvalidArgumentError => ({
  type: 'InvalidArgumentError',
  message,
  argument,
});

export const createStorageFailureError = (
  message: string,
  cause?: unknown
): StorageFailureError => ({
  type: 'StorageFailureError',
  message,
  retryable: true,
  cause,
});

export const createBusyError = (attempts: number): BusyError => ({
  type: 'BusyError',
  message: `Could not record the fact after ${String(attempts)} attempts due to concurrent updates. Retry the request.`,
  retryable: true,
  attempts,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const LEARNING_FACTS_ERROR_HTTP_STATUS = {
  NotFoundError: 404,
  ForbiddenError: 403,
  ValidationError: 400,
  InvalidArgumentError: 422,
  StorageFailureError: 500,
  BusyError: 503,
} as const satisfies Record<LearningFactsError['type'], number>;

export type LearningFactsErrorStatus =
  (typeof LEARNING_FACTS_ERROR_HTTP_STATUS)[LearningFactsError['type']];

/**
 * Get HTTP status code for a learning facts error.
 */
export const getHttpStatusForError = (error: LearningFactsError): LearningFactsErrorStatus => {
  return LEARNING_FACTS_ERROR_HTTP_STATUS[error.type];
};
