/**
 * JWT Authentication Adapter
 *
 * Verifies HMAC-signed bearer tokens with the `jose` library.
 * The token's `sub` claim carries the caller's username.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createAuthProviderError,
  createInvalidTokenError,
  createTokenExpiredError,
  createTokenSignatureError,
  type AuthError,
} from '../../core/errors.js';
import { toUsername, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';
import type { JWTPayload, JWTVerifyOptions } from 'jose';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shape of jose's `jwtVerify` as used here. Injected so tests can stub it.
 */
export type JWTVerifyFn = (
  jwt: string,
  key: Uint8Array,
  options: JWTVerifyOptions
) => Promise<{ payload: JWTPayload }>;

export type HmacAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface MakeJWTAdapterOptions {
  /** `jwtVerify` from jose */
  jwtVerify: JWTVerifyFn;
  /** Shared signing secret */
  secret: string;
  /** @default 'HS256' */
  algorithm?: HmacAlgorithm;
  issuer?: string;
  audience?: string;
  /**
   * Seconds of clock skew tolerated on `exp` / `nbf`.
   * @default 5
   */
  clockToleranceSeconds?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

const getErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

/**
 * Maps a jose verification failure onto the auth error union.
 */
const toAuthError = (error: unknown): AuthError => {
  switch (getErrorCode(error)) {
    case 'ERR_JWT_EXPIRED':
      return createTokenExpiredError(new Date());
    case 'ERR_JWS_SIGNATURE_VERIFICATION_FAILED':
      return createTokenSignatureError('Token signature verification failed');
    case 'ERR_JWS_INVALID':
    case 'ERR_JWT_INVALID':
    case 'ERR_JWT_CLAIM_VALIDATION_FAILED':
    case 'ERR_JOSE_ALG_NOT_ALLOWED':
      return createInvalidTokenError(
        error instanceof Error ? error.message : 'Invalid token',
        error
      );
    default:
      break;
  }

  const message =
    error instanceof Error ? error.message : 'Unknown error during token verification';
  return createAuthProviderError(message, error);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a JWT authentication adapter.
 *
 * @example
 * import { jwtVerify } from 'jose';
 *
 * const authProvider = makeJWTAdapter({ jwtVerify, secret: config.auth.jwtSecret });
 */
export const makeJWTAdapter = (options: MakeJWTAdapterOptions): AuthProvider => {
  const { jwtVerify, algorithm = 'HS256', issuer, audience, clockToleranceSeconds = 5 } = options;

  const key = new TextEncoder().encode(options.secret);
  const verifyOptions: JWTVerifyOptions = {
    algorithms: [algorithm],
    clockTolerance: clockToleranceSeconds,
    ...(issuer !== undefined && { issuer }),
    ...(audience !== undefined && { audience }),
  };

  return {
    async verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      let payload: JWTPayload;
      try {
        ({ payload } = await jwtVerify(token, key, verifyOptions));
      } catch (error) {
        return err(toAuthError(error));
      }

      const username = payload.sub;
      if (typeof username !== 'string' || username === '') {
        return err(createInvalidTokenError('Token missing subject (sub) claim'));
      }

      const exp = payload.exp;
      if (typeof exp !== 'number') {
        return err(createInvalidTokenError('Token missing expiration (exp) claim'));
      }

      return ok({
        username: toUsername(username),
        expiresAt: new Date(exp * 1000),
      });
    },
  };
};
