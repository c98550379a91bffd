/**
 * Authentication Module - Domain Errors
 *
 * Token and session failures as discriminated unions with a 'type' field.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Token Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token is malformed, or its claims do not match what this server accepts.
 */
export interface InvalidTokenError {
  readonly type: 'InvalidTokenError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface TokenExpiredError {
  readonly type: 'TokenExpiredError';
  readonly message: string;
  readonly expiredAt: Date;
}

export interface TokenSignatureError {
  readonly type: 'TokenSignatureError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Route needs a caller identity and the request carried none.
 */
export interface AuthenticationRequiredError {
  readonly type: 'AuthenticationRequiredError';
  readonly message: string;
}

/**
 * Token verification could not run (misconfiguration or key failure).
 */
export interface AuthProviderError {
  readonly type: 'AuthProviderError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export type AuthError =
  | InvalidTokenError
  | TokenExpiredError
  | TokenSignatureError
  | AuthenticationRequiredError
  | AuthProviderError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidTokenError = (message: string, cause?: unknown): InvalidTokenError => ({
  type: 'InvalidTokenError',
  message,
  cause,
});

export const createTokenExpiredError = (expiredAt: Date): TokenExpiredError => ({
  type: 'TokenExpiredError',
  message: `Token expired at ${expiredAt.toISOString()}`,
  expiredAt,
});

export const createTokenSignatureError = (message: string): TokenSignatureError => ({
  type: 'TokenSignatureError',
  message,
});

export const createAuthenticationRequiredError = (): AuthenticationRequiredError => ({
  type: 'AuthenticationRequiredError',
  message: 'Authentication required',
});

export const createAuthProviderError = (message: string, cause?: unknown): AuthProviderError => ({
  type: 'AuthProviderError',
  message,
  retryable: true,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const AUTH_ERROR_HTTP_STATUS = {
  InvalidTokenError: 401,
  TokenExpiredError: 401,
  TokenSignatureError: 401,
  AuthenticationRequiredError: 401,
  AuthProviderError: 503,
} as const satisfies Record<AuthError['type'], number>;
