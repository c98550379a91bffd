/**
 * Authentication Module - Domain Types
 *
 * The caller's verified identity is a username: the same value stored in
 * the `users.username` column that ledger routes compare against.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Username taken from a verified token's `sub` claim.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type Username = string & { readonly __brand: unique symbol };

/**
 * Type-safe constructor for Username.
 */
export const toUsername = (name: string): Username => name as Username;

// ─────────────────────────────────────────────────────────────────────────────
// Session Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session created after successful token verification.
 */
export interface AuthSession {
  readonly username: Username;
  readonly expiresAt: Date;
}

/**
 * Session for requests that carry no token.
 */
export interface AnonymousSession {
  readonly username: null;
  readonly isAnonymous: true;
}

export type AuthContext = AuthSession | AnonymousSession;

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isAuthenticated = (ctx: AuthContext): ctx is AuthSession => {
  return ctx.username !== null;
};

export const isAnonymous = (ctx: AuthContext): ctx is AnonymousSession => {
  return ctx.username === null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const ANONYMOUS_SESSION: AnonymousSession = {
  username: null,
  isAnonymous: true,
} as const;

/** Authorization header name (lowercase for HTTP headers) */
export const AUTH_HEADER = 'authorization' as const;

/** Bearer token prefix */
export const BEARER_PREFIX = 'Bearer ' as const;
