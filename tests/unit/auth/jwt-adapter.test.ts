/**
 * Tests for the JWT authentication adapter.
 */

import { describe, expect, it, vi } from 'vitest';

import { makeJWTAdapter, type JWTVerifyFn } from '@/modules/auth/index.js';

import type { JWTPayload } from 'jose';

// ─────────────────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────────────────

const TEST_SECRET = 'test-secret';

/**
 * Error shaped like the ones jose throws: a message plus a string `code`.
 */
class FakeJoseError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
  }
}

const createMockJwtVerify = (outcome: JWTPayload | Error) =>
  vi.fn<JWTVerifyFn>(async () => {
    if (outcome instanceof Error) {
      throw outcome;
    }
    return { payload: outcome };
  });

const NOW_SECONDS = Math.floor(Date.now() / 1000);
const EXPIRES_AT = NOW_SECONDS + 3600;

const validPayload: JWTPayload = {
  sub: 'alice',
  exp: EXPIRES_AT,
  iat: NOW_SECONDS,
};

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('makeJWTAdapter', () => {
  describe('successful verification', () => {
    it('returns a session with the username from sub', async () => {
      const jwtVerify = createMockJwtVerify(validPayload);
      const adapter = makeJWTAdapter({ jwtVerify, secret: TEST_SECRET });

      const result = await adapter.verifyToken('valid-token');

      const session = result._unsafeUnwrap();
      expect(session.username).toBe('alice');
      expect(session.expiresAt.getTime()).toBe(EXPIRES_AT * 1000);
    });

    it('passes the encoded secret and verify options to jose', async () => {
      const jwtVerify = createMockJwtVerify(validPayload);
      const adapter = makeJWTAdapter({
        jwtVerify,
        secret: TEST_SECRET,
        algorithm: 'HS512',
        issuer: 'test-issuer',
        audience: 'test-audience',
      });

      await adapter.verifyToken('valid-token');

      expect(jwtVerify).toHaveBeenCalledWith('valid-token', new TextEncoder().encode(TEST_SECRET), {
        algorithms: ['HS512'],
        clockTolerance: 5,
        issuer: 'test-issuer',
        audience: 'test-audience',
      });
    });

    it('omits issuer and audience when not configured', async () => {
      const jwtVerify = createMockJwtVerify(validPayload);
      const adapter = makeJWTAdapter({ jwtVerify, secret: TEST_SECRET, clockToleranceSeconds: 0 });

      await adapter.verifyToken('valid-token');

      expect(jwtVerify.mock.calls[0]?.[2]).toEqual({ algorithms: ['HS256'], clockTolerance: 0 });
    });
  });

  describe('claim checks', () => {
    it('rejects a token without sub', async () => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify({ exp: EXPIRES_AT }),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidTokenError',
        message: 'Token missing subject (sub) claim',
      });
    });

    it('rejects a token without exp', async () => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify({ sub: 'alice' }),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidTokenError',
        message: 'Token missing expiration (exp) claim',
      });
    });
  });

  describe('jose failures', () => {
    it('maps ERR_JWT_EXPIRED to TokenExpiredError', async () => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify(new FakeJoseError('ERR_JWT_EXPIRED', '"exp" claim failed')),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr().type).toBe('TokenExpiredError');
    });

    it('maps signature failures to TokenSignatureError', async () => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify(
          new FakeJoseError('ERR_JWS_SIGNATURE_VERIFICATION_FAILED', 'signature failed')
        ),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr().type).toBe('TokenSignatureError');
    });

    it.each([
      'ERR_JWS_INVALID',
      'ERR_JWT_INVALID',
      'ERR_JWT_CLAIM_VALIDATION_FAILED',
      'ERR_JOSE_ALG_NOT_ALLOWED',
    ])('maps %s to InvalidTokenError', async (code) => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify(new FakeJoseError(code, 'rejected')),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidTokenError',
        message: 'rejected',
      });
    });

    it('maps anything else to AuthProviderError', async () => {
      const adapter = makeJWTAdapter({
        jwtVerify: createMockJwtVerify(new Error('crypto unavailable')),
        secret: TEST_SECRET,
      });

      const result = await adapter.verifyToken('token');

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'AuthProviderError',
        message: 'crypto unavailable',
        retryable: true,
      });
    });
  });
});
