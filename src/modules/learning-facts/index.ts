/**
 * Learning Facts Module - Public API
 *
 * Per-user fact ledger with daily streak accounting.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CalendarDate,
  FactTimestamp,
  FactEntry,
  StoredFactRow,
  NewFactInput,
  FactView,
  FactPage,
  StoredStreak,
  StreakState,
  UserLedgerRecord,
  UserLedgerUpdate,
  StatsView,
} from './core/types.js';

export {
  MIN_LIST_LIMIT,
  MAX_LIST_LIMIT,
  DEFAULT_LIST_LIMIT,
  WEEK_WINDOW_DAYS,
  MAX_CONTENT_LENGTH,
  MAX_CATEGORY_LENGTH,
  MAX_SOURCE_URL_LENGTH,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LearningFactsError,
  NotFoundError,
  ForbiddenError,
  ValidationError,
  InvalidArgumentError,
  StorageFailureError,
  BusyError,
} from './core/errors.js';

export {
  createNotFoundError,
  createForbiddenError,
  createValidationError,
  createInvalidArgumentError,
  createStorageFailureError,
  createBusyError,
  getHttpStatusForError,
  LEARNING_FACTS_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { UserFactsRepository, Clock } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core (Pure Functions)
// ─────────────────────────────────────────────────────────────────────────────

export { computeNewStreak } from './core/streak.js';

export {
  deserializeLedger,
  serializeLedger,
  createFactEntry,
  appendFact,
  appendStoredFact,
  filterByCategory,
  sortByRecency,
  validateLimit,
  paginate,
  toFactView,
} from './core/ledger.js';

export { aggregateStats, countFactsInWindow, type StoredCounters } from './core/stats.js';

export {
  parseCalendarDate,
  toCalendarDate,
  addDays,
  formatFactTimestamp,
  parseFactTimestamp,
  normalizeFactTimestamp,
} from './core/calendar.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  authorizeUser,
  type AuthorizeUserDeps,
  type AuthorizeUserInput,
} from './core/usecases/authorize-user.js';

export {
  addFact,
  DEFAULT_APPEND_RETRY,
  type AddFactDeps,
  type AddFactInput,
  type AppendRetryPolicy,
} from './core/usecases/add-fact.js';

export {
  listFacts,
  type ListFactsDeps,
  type ListFactsInput,
} from './core/usecases/list-facts.js';

export { getStats, type GetStatsDeps, type GetStatsInput } from './core/usecases/get-stats.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeUserFactsRepo, type UserFactsRepoOptions } from './shell/repo/user-facts-repo.js';

export { makeSystemClock } from './shell/clock/system-clock.js';

export {
  makeLearningFactsRoutes,
  type MakeLearningFactsRoutesDeps,
} from './shell/rest/routes.js';

export {
  UserParamsSchema,
  AddFactBodySchema,
  ListFactsQuerySchema,
  FactViewSchema,
  StatsSchema,
  AddFactResponseSchema,
  ListFactsResponseSchema,
  GetStatsResponseSchema,
  ErrorResponseSchema,
  type UserParams,
  type AddFactBody,
  type ListFactsQuery,
} from './shell/rest/schemas.js';
