/**
 * Authenticate Use Case
 *
 * Turns an optional bearer token into an authentication context.
 */

import { ok, type Result } from 'neverthrow';

import { ANONYMOUS_SESSION, type AuthContext } from '../types.js';

import type { AuthError } from '../errors.js';
import type { AuthProvider } from '../ports.js';

export interface AuthenticateDeps {
  authProvider: AuthProvider;
}

export interface AuthenticateInput {
  /** Bearer token (without 'Bearer ' prefix). Null for anonymous. */
  token: string | null;
}

/**
 * Authenticates a request.
 *
 * A missing token yields the anonymous session; a present but bad token is an error.
 * Whether anonymous callers may proceed is decided per route.
 */
export async function authenticate(
  deps: AuthenticateDeps,
  input: AuthenticateInput
): Promise<Result<AuthContext, AuthError>> {
  const { token } = input;

  if (token === null || token === '') {
    return ok(ANONYMOUS_SESSION);
  }

  const sessionResult = await deps.authProvider.verifyToken(token);
  return sessionResult.map((session): AuthContext => session);
}
