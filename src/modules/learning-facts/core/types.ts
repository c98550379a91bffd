/**
 * Learning Facts Module - Domain Types
 *
 * Types for the per-user fact ledger and streak accounting.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Smallest page size accepted by list queries */
export const MIN_LIST_LIMIT = 1;

/** Largest page size accepted by list queries */
export const MAX_LIST_LIMIT = 500;

/** Page size used when the caller does not pass one */
export const DEFAULT_LIST_LIMIT = 50;

/** Days in the "this week" window, today included */
export const WEEK_WINDOW_DAYS = 7;

/** Maximum fact content length (characters) */
export const MAX_CONTENT_LENGTH = 2000;

/** Maximum category length (characters) */
export const MAX_CATEGORY_LENGTH = 100;

/** Maximum source URL length (characters) */
export const MAX_SOURCE_URL_LENGTH = 2048;

// ─────────────────────────────────────────────────────────────────────────────
// Calendar Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Calendar date in the reference calendar (UTC), formatted YYYY-MM-DD.
 */
export type CalendarDate = string;

/**
 * UTC timestamp with second precision, formatted YYYY-MM-DDTHH:MM:SSZ.
 */
export type FactTimestamp = string;

// ─────────────────────────────────────────────────────────────────────────────
// Ledger Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single learned fact as held in a user's ledger.
 */
export interface FactEntry {
  content: string;
  category?: string;
  sourceUrl?: string;
  /** Server-assigned time of the append; null for legacy entries without one */
  learnedAt: string | null;
}

/**
 * A fact as serialized inside the user's `facts_learned` column.
 */
export interface StoredFactRow {
  content: string;
  category: string | null;
  source_url: string | null;
  learned_at: string | null;
}

/**
 * Caller-supplied fields of a new fact.
 */
export interface NewFactInput {
  content: string;
  category?: string | undefined;
  sourceUrl?: string | undefined;
}

/**
 * A fact as returned to callers.
 */
export interface FactView {
  content: string;
  category?: string;
  sourceUrl?: string;
  /** Normalized timestamp, or null when the stored value cannot be parsed */
  learnedAt: FactTimestamp | null;
}

/**
 * One page of a user's facts.
 */
export interface FactPage<T> {
  items: T[];
  /** Size of the filtered list before truncation */
  total: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Streak Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stored streak counters. Legacy rows may hold nulls.
 */
export interface StoredStreak {
  currentStreak: number | null;
  longestStreak: number | null;
  lastActivityDate: string | null;
}

/**
 * Streak counters after an activity.
 */
export interface StreakState {
  currentStreak: number;
  longestStreak: number;
  lastActivityDate: CalendarDate;
}

// ─────────────────────────────────────────────────────────────────────────────
// User Record
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The ledger-related fields of a user row.
 */
export interface UserLedgerRecord extends StoredStreak {
  id: number;
  username: string;
  /** Serialized fact list exactly as stored (may be null or corrupt) */
  factsLearned: string | null;
  totalFactsCount: number | null;
  /** Row version used for compare-and-swap updates */
  version: number;
}

/**
 * Fields written by a fact append.
 */
export interface UserLedgerUpdate {
  factsLearned: string;
  totalFactsCount: number;
  currentStreak: number;
  longestStreak: number;
  lastActivityDate: CalendarDate;
}

// ─────────────────────────────────────────────────────────────────────────────
// Stats Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reporting view over a user's streak and ledger.
 */
export interface StatsView {
  currentStreak: number;
  longestStreak: number;
  totalFactsCount: number;
  /** Derived on every read, never stored */
  factsThisWeek: number;
  lastActivityDate: string | null;
}
