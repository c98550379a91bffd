/**
 * HTTP Session Extractor
 *
 * Reads the bearer token from the Authorization header.
 */

import { AUTH_HEADER, BEARER_PREFIX } from '../../core/types.js';

import type { SessionExtractor } from '../../core/ports.js';
import type { FastifyRequest } from 'fastify';

/**
 * `Authorization: Bearer <token>` → `<token>`; anything else → null.
 */
export const httpSessionExtractor: SessionExtractor<FastifyRequest> = {
  extractToken(request: FastifyRequest): string | null {
    const authHeader = request.headers[AUTH_HEADER];

    if (typeof authHeader !== 'string' || !authHeader.startsWith(BEARER_PREFIX)) {
      return null;
    }

    const token = authHeader.slice(BEARER_PREFIX.length).trim();
    return token !== '' ? token : null;
  },
};
