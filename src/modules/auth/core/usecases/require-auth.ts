/**
 * Require Auth Use Case
 *
 * Narrows an authentication context to the caller's username.
 */

import { ok, err, type Result } from 'neverthrow';

import { createAuthenticationRequiredError, type AuthError } from '../errors.js';
import { isAuthenticated, type AuthContext, type Username } from '../types.js';

/**
 * @returns Ok(username) if authenticated, Err(AuthenticationRequiredError) if anonymous
 */
export function requireAuth(context: AuthContext): Result<Username, AuthError> {
  if (!isAuthenticated(context)) {
    return err(createAuthenticationRequiredError());
  }
  return ok(context.username);
}
