/**
 * Authentication Module - Public API
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export type { Username, AuthSession, AnonymousSession, AuthContext } from './core/types.js';

export {
  toUsername,
  isAuthenticated,
  isAnonymous,
  ANONYMOUS_SESSION,
  AUTH_HEADER,
  BEARER_PREFIX,
} from './core/types.js';

export type {
  AuthError,
  InvalidTokenError,
  TokenExpiredError,
  TokenSignatureError,
  AuthenticationRequiredError,
  AuthProviderError,
} from './core/errors.js';

export {
  createInvalidTokenError,
  createTokenExpiredError,
  createTokenSignatureError,
  createAuthenticationRequiredError,
  createAuthProviderError,
  AUTH_ERROR_HTTP_STATUS,
} from './core/errors.js';

export type { AuthProvider, SessionExtractor } from './core/ports.js';

export {
  authenticate,
  type AuthenticateDeps,
  type AuthenticateInput,
} from './core/usecases/authenticate.js';

export { requireAuth } from './core/usecases/require-auth.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeJWTAdapter,
  type MakeJWTAdapterOptions,
  type JWTVerifyFn,
  type HmacAlgorithm,
} from './shell/adapters/jwt-adapter.js';

export {
  makeInMemoryAuthProvider,
  createTestAuthProvider,
  createTestToken,
  type MakeInMemoryAuthProviderOptions,
} from './shell/adapters/in-memory-adapter.js';

export { httpSessionExtractor } from './shell/extractors/http-extractor.js';

export {
  makeAuthMiddleware,
  requireAuthHandler,
  type MakeAuthMiddlewareDeps,
} from './shell/middleware/fastify-auth.js';
