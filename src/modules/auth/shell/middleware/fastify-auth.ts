/**
 * Fastify Authentication Middleware
 *
 * A global hook that attaches `request.auth`, plus a per-route guard that
 * turns away anonymous callers.
 */

import { AUTH_ERROR_HTTP_STATUS } from '../../core/errors.js';
import { authenticate, type AuthenticateDeps } from '../../core/usecases/authenticate.js';
import { requireAuth } from '../../core/usecases/require-auth.js';
import { httpSessionExtractor } from '../extractors/http-extractor.js';

import type { AuthContext } from '../../core/types.js';
import type { FastifyReply, FastifyRequest, preHandlerHookHandler } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Request Decoration
// ─────────────────────────────────────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyRequest {
    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  }
}

export type MakeAuthMiddlewareDeps = AuthenticateDeps;

// ─────────────────────────────────────────────────────────────────────────────
// Global Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the global auth hook.
 *
 * Requests without a token pass through as anonymous; requests with a
 * bad token are rejected here with 401 (or 503 when verification itself fails).
 *
 * @example
 * app.addHook('preHandler', makeAuthMiddleware({ authProvider }));
 */
export function makeAuthMiddleware(deps: MakeAuthMiddlewareDeps): preHandlerHookHandler {
  const handler = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const token = httpSessionExtractor.extractToken(request);

    const result = await authenticate(deps, { token });

    if (result.isErr()) {
      const error = result.error;
      if (error.type === 'AuthProviderError') {
        request.log.error({ err: error.cause }, error.message);
      }

      await reply.status(AUTH_ERROR_HTTP_STATUS[error.type]).send({
        ok: false,
        error: error.type,
        message: error.message,
      });
      return;
    }

    request.auth = result.value;
  };

  // Async hooks need the assertion under strictFunctionTypes
  return handler as preHandlerHookHandler;
}

// ─────────────────────────────────────────────────────────────────────────────
// Route Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Route-level guard; rejects anonymous requests with 401.
 * Relies on the global middleware having set `request.auth`.
 *
 * @example
 * app.get('/api/v1/users/:userId/streaks', { preHandler: requireAuthHandler }, handler);
 */
const requireAuthHandlerImpl = async (
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> => {
  const result = requireAuth(request.auth);

  if (result.isErr()) {
    await reply.status(401).send({
      ok: false,
      error: result.error.type,
      message: result.error.message,
    });
  }
};

export const requireAuthHandler = requireAuthHandlerImpl as preHandlerHookHandler;
