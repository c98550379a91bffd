/**
 * Learning Facts REST API Schemas
 *
 * TypeBox schemas for request/response validation.
 * Range checks on `limit` and content rules live in the core so they
 * surface as domain errors rather than schema failures.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Path params shared by every user-scoped route.
 */
export const UserParamsSchema = Type.Object(
  {
    userId: Type.Integer({ minimum: 1, description: 'Target user id' }),
  },
  { additionalProperties: false }
);

export type UserParams = Static<typeof UserParamsSchema>;

/**
 * Request body for POST /facts.
 */
export const AddFactBodySchema = Type.Object(
  {
    content: Type.String({ description: 'What was learned' }),
    category: Type.Optional(Type.String({ description: 'Free-form grouping label' })),
    source_url: Type.Optional(Type.String({ description: 'Where the fact came from' })),
  },
  { additionalProperties: false }
);

export type AddFactBody = Static<typeof AddFactBodySchema>;

/**
 * Query params for GET /facts.
 */
export const ListFactsQuerySchema = Type.Object(
  {
    limit: Type.Optional(Type.Integer({ description: 'Page size (1-500, default 50)' })),
    category: Type.Optional(Type.String({ description: 'Exact-match category filter' })),
  },
  { additionalProperties: false }
);

export type ListFactsQuery = Static<typeof ListFactsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const FactViewSchema = Type.Object({
  content: Type.String(),
  category: Type.Optional(Type.String()),
  source_url: Type.Optional(Type.String()),
  learned_at: Type.Union([Type.String(), Type.Null()]),
});

export type FactViewBody = Static<typeof FactViewSchema>;

/**
 * Success response for POST /facts.
 */
export const AddFactResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: FactViewSchema,
});

/**
 * Success response for GET /facts.
 */
export const ListFactsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    items: Type.Array(FactViewSchema),
    total: Type.Integer(),
  }),
});

export const StatsSchema = Type.Object({
  current_streak: Type.Integer(),
  longest_streak: Type.Integer(),
  total_facts_count: Type.Integer(),
  facts_this_week: Type.Integer(),
  last_activity_date: Type.Union([Type.String(), Type.Null()]),
});

export type StatsBody = Static<typeof StatsSchema>;

/**
 * Success response for GET /streaks.
 */
export const GetStatsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: StatsSchema,
});

/**
 * Error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
