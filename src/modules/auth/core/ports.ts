/**
 * Authentication Module - Port Interfaces
 */

import type { AuthError } from './errors.js';
import type { AuthSession } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Verifies bearer tokens.
 *
 * Implementations validate the signature and expiry, read the username
 * from the `sub` claim, and report every failure as an AuthError rather
 * than throwing.
 */
export interface AuthProvider {
  verifyToken(token: string): Promise<Result<AuthSession, AuthError>>;
}

/**
 * Pulls a bearer token out of a transport-specific request.
 * Returns null when none is present; never validates the token.
 */
export interface SessionExtractor<T> {
  extractToken(request: T): string | null;
}
