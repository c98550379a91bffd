/**
 * Learning Facts REST Routes
 *
 * REST API endpoints for a user's fact ledger and streak stats.
 * All endpoints require authentication; the caller may only reach their own user id.
 */

import {
  AddFactBodySchema,
  AddFactResponseSchema,
  ErrorResponseSchema,
  GetStatsResponseSchema,
  ListFactsQuerySchema,
  ListFactsResponseSchema,
  UserParamsSchema,
  type AddFactBody,
  type FactViewBody,
  type ListFactsQuery,
  type StatsBody,
  type UserParams,
} from './schemas.js';
import { isAuthenticated } from '../../../auth/core/types.js';
import { requireAuthHandler } from '../../../auth/shell/middleware/fastify-auth.js';
import { getHttpStatusForError, type LearningFactsError } from '../../core/errors.js';
import { addFact, type AppendRetryPolicy } from '../../core/usecases/add-fact.js';
import { getStats } from '../../core/usecases/get-stats.js';
import { listFacts } from '../../core/usecases/list-facts.js';

import type { Clock, UserFactsRepository } from '../../core/ports.js';
import type { FactView, StatsView } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for learning facts routes.
 */
export interface MakeLearningFactsRoutesDeps {
  userFactsRepo: UserFactsRepository;
  clock: Clock;
  appendRetry?: AppendRetryPolicy;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends an unauthorized error response.
 */
function sendUnauthorized(reply: FastifyReply) {
  return reply.status(401).send({
    ok: false,
    error: 'Unauthorized',
    message: 'Authentication required',
  });
}

/**
 * Sends a domain error with its mapped status.
 * Server-side kinds are logged; caller mistakes are not.
 */
function sendError(request: FastifyRequest, reply: FastifyReply, error: LearningFactsError) {
  if (error.type === 'StorageFailureError') {
    request.log.error({ err: error.cause, errorType: error.type }, error.message);
  } else if (error.type === 'BusyError') {
    request.log.warn({ attempts: error.attempts }, error.message);
  }

  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const toFactBody = (fact: FactView): FactViewBody => ({
  content: fact.content,
  ...(fact.category !== undefined && { category: fact.category }),
  ...(fact.sourceUrl !== undefined && { source_url: fact.sourceUrl }),
  learned_at: fact.learnedAt,
});

const toStatsBody = (stats: StatsView): StatsBody => ({
  current_streak: stats.currentStreak,
  longest_streak: stats.longestStreak,
  total_facts_count: stats.totalFactsCount,
  facts_this_week: stats.factsThisWeek,
  last_activity_date: stats.lastActivityDate,
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates learning facts REST routes.
 */
export const makeLearningFactsRoutes = (deps: MakeLearningFactsRoutesDeps): FastifyPluginAsync => {
  const { userFactsRepo, clock, appendRetry } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/users/:userId/facts - Record a learned fact
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: UserParams; Body: AddFactBody }>(
      '/api/v1/users/:userId/facts',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: UserParamsSchema,
          body: AddFactBodySchema,
          response: {
            201: AddFactResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const { userId } = request.params;
        const { content, category, source_url: sourceUrl } = request.body;

        const result = await addFact(
          {
            repo: userFactsRepo,
            clock,
            ...(appendRetry !== undefined && { retry: appendRetry }),
          },
          {
            userId,
            callerUsername: request.auth.username,
            fact: { content, category, sourceUrl },
          }
        );

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        return reply.status(201).send({
          ok: true,
          data: toFactBody(result.value),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/users/:userId/facts - List facts, newest first
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: UserParams; Querystring: ListFactsQuery }>(
      '/api/v1/users/:userId/facts',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: UserParamsSchema,
          querystring: ListFactsQuerySchema,
          response: {
            200: ListFactsResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            422: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const { userId } = request.params;
        const { limit, category } = request.query;

        const result = await listFacts(
          { repo: userFactsRepo },
          { userId, callerUsername: request.auth.username, limit, category }
        );

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: {
            items: result.value.items.map(toFactBody),
            total: result.value.total,
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/users/:userId/streaks - Streak counters and weekly count
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: UserParams }>(
      '/api/v1/users/:userId/streaks',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: UserParamsSchema,
          response: {
            200: GetStatsResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await getStats(
          { repo: userFactsRepo, clock },
          { userId: request.params.userId, callerUsername: request.auth.username }
        );

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: toStatsBody(result.value),
        });
      }
    );
  };
};
