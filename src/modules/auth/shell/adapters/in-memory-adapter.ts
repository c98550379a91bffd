/**
 * In-Memory Authentication Adapter
 *
 * AuthProvider backed by a token → username map, for tests and local runs.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidTokenError,
  createTokenExpiredError,
  type AuthError,
} from '../../core/errors.js';
import { toUsername, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeInMemoryAuthProviderOptions {
  /** Token → username */
  validTokens?: Map<string, string>;
  /** Session lifetime from now. Default: 1 hour */
  tokenTTLMs?: number;
  /** Tokens that verify as expired */
  expiredTokens?: Set<string>;
}

const DEFAULT_TOKEN_TTL_MS = 60 * 60 * 1000;

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an in-memory auth provider.
 *
 * @example
 * const authProvider = makeInMemoryAuthProvider({
 *   validTokens: new Map([['test-token-alice', 'alice']]),
 * });
 */
export const makeInMemoryAuthProvider = (
  options: MakeInMemoryAuthProviderOptions = {}
): AuthProvider => {
  const tokens = options.validTokens ?? new Map<string, string>();
  const expiredTokens = options.expiredTokens ?? new Set<string>();
  const tokenTTLMs = options.tokenTTLMs ?? DEFAULT_TOKEN_TTL_MS;

  return {
    verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      if (expiredTokens.has(token)) {
        return Promise.resolve(err(createTokenExpiredError(new Date(Date.now() - 1000))));
      }

      const username = tokens.get(token);
      if (username === undefined) {
        return Promise.resolve(err(createInvalidTokenError('Invalid or unknown token')));
      }

      return Promise.resolve(
        ok({
          username: toUsername(username),
          expiresAt: new Date(Date.now() + tokenTTLMs),
        })
      );
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const createTestToken = (username: string): string => {
  return `test-token-${username}`;
};

/**
 * Provider with two known users and one expired token.
 */
export const createTestAuthProvider = (): {
  provider: AuthProvider;
  tokens: {
    alice: string;
    bob: string;
    expired: string;
  };
  usernames: {
    alice: string;
    bob: string;
  };
} => {
  const usernames = {
    alice: 'alice',
    bob: 'bob',
  };

  const tokens = {
    alice: createTestToken(usernames.alice),
    bob: createTestToken(usernames.bob),
    expired: 'expired-token',
  };

  const validTokens = new Map([
    [tokens.alice, usernames.alice],
    [tokens.bob, usernames.bob],
    [tokens.expired, usernames.alice],
  ]);

  const provider = makeInMemoryAuthProvider({
    validTokens,
    expiredTokens: new Set([tokens.expired]),
  });

  return { provider, tokens, usernames };
};
