/**
 * Learning Facts Module - Fact Ledger
 *
 * Pure functions over a user's list of learned facts: decoding the stored
 * blob, appending, and the filter/sort/paginate steps of a list query.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, fromThrowable, type Result } from 'neverthrow';

import { formatFactTimestamp, normalizeFactTimestamp, parseFactTimestamp } from './calendar.js';
import {
  createInvalidArgumentError,
  createValidationError,
  type InvalidArgumentError,
  type ValidationError,
} from './errors.js';
import {
  MAX_CATEGORY_LENGTH,
  MAX_CONTENT_LENGTH,
  MAX_LIST_LIMIT,
  MAX_SOURCE_URL_LENGTH,
  MIN_LIST_LIMIT,
  type FactEntry,
  type FactPage,
  type FactView,
  type NewFactInput,
  type StoredFactRow,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Stored Shape
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Minimum shape an item of the stored list needs to be read.
 * Optional fields of any other type read as absent; unknown keys are tolerated.
 */
const StoredFactSchema = Type.Object({
  content: Type.String({ minLength: 1 }),
  category: Type.Optional(Type.Unknown()),
  source_url: Type.Optional(Type.Unknown()),
  learned_at: Type.Optional(Type.Unknown()),
});

const safeJsonParse = fromThrowable(
  (raw: string): unknown => JSON.parse(raw),
  (cause) => cause
);

const optionalText = (value: unknown): string | undefined => {
  return typeof value === 'string' && value !== '' ? value : undefined;
};

const toEntry = (row: Static<typeof StoredFactSchema>): FactEntry => {
  const category = optionalText(row.category);
  const sourceUrl = optionalText(row.source_url);
  return {
    content: row.content,
    ...(category !== undefined && { category }),
    ...(sourceUrl !== undefined && { sourceUrl }),
    learnedAt: typeof row.learned_at === 'string' ? row.learned_at : null,
  };
};

const toStoredRow = (entry: FactEntry): StoredFactRow => ({
  content: entry.content,
  category: entry.category ?? null,
  source_url: entry.sourceUrl ?? null,
  learned_at: entry.learnedAt,
});

/**
 * Stored list exactly as parsed. Absent, unparsable or non-array input
 * yields an empty list.
 */
const parseStoredList = (raw: string | null | undefined): unknown[] => {
  if (raw === null || raw === undefined || raw === '') {
    return [];
  }
  const parsed = safeJsonParse(raw);
  if (parsed.isErr() || !Array.isArray(parsed.value)) {
    return [];
  }
  return parsed.value;
};

// ─────────────────────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decodes the stored fact list.
 *
 * Absent, unparsable or non-array input decodes to an empty ledger so that
 * corrupt history never blocks new activity. Items without non-empty string
 * content are skipped on read; the rest are kept as stored.
 */
export function deserializeLedger(raw: string | null | undefined): FactEntry[] {
  const entries: FactEntry[] = [];
  for (const item of parseStoredList(raw)) {
    if (Value.Check(StoredFactSchema, item)) {
      entries.push(toEntry(item));
    }
  }
  return entries;
}

/**
 * Encodes a fact list in the stored form.
 */
export function serializeLedger(ledger: readonly FactEntry[]): string {
  return JSON.stringify(ledger.map(toStoredRow));
}

// ─────────────────────────────────────────────────────────────────────────────
// Writing
// ─────────────────────────────────────────────────────────────────────────────

const isHttpUrl = (value: string): boolean => {
  if (!URL.canParse(value)) {
    return false;
  }
  const { protocol } = new URL(value);
  return protocol === 'http:' || protocol === 'https:';
};

/**
 * Validates caller input and stamps it with the server time.
 */
export function createFactEntry(
  input: NewFactInput,
  now: Date
): Result<FactEntry, ValidationError> {
  const { content } = input;

  if (content.trim() === '') {
    return err(createValidationError('content', 'Fact content must not be empty'));
  }
  if (content.length > MAX_CONTENT_LENGTH) {
    return err(
      createValidationError(
        'content',
        `Fact content must be at most ${String(MAX_CONTENT_LENGTH)} characters`
      )
    );
  }

  const category = optionalText(input.category);
  if (category !== undefined && category.length > MAX_CATEGORY_LENGTH) {
    return err(
      createValidationError(
        'category',
        `Category must be at most ${String(MAX_CATEGORY_LENGTH)} characters`
      )
    );
  }

  const sourceUrl = optionalText(input.sourceUrl);
  if (sourceUrl !== undefined) {
    if (sourceUrl.length > MAX_SOURCE_URL_LENGTH) {
      return err(
        createValidationError(
          'source_url',
          `Source URL must be at most ${String(MAX_SOURCE_URL_LENGTH)} characters`
        )
      );
    }
    if (!isHttpUrl(sourceUrl)) {
      return err(createValidationError('source_url', 'Source URL must be an http(s) URL'));
    }
  }

  return ok({
    content,
    ...(category !== undefined && { category }),
    ...(sourceUrl !== undefined && { sourceUrl }),
    learnedAt: formatFactTimestamp(now),
  });
}

const ensureAppendable = (entry: FactEntry): Result<FactEntry, ValidationError> => {
  if (entry.content.trim() === '') {
    return err(createValidationError('content', 'Fact content must not be empty'));
  }
  return ok(entry);
};

/**
 * Returns a new ledger with `entry` added after the existing entries.
 */
export function appendFact(
  ledger: readonly FactEntry[],
  entry: FactEntry
): Result<FactEntry[], ValidationError> {
  return ensureAppendable(entry).map((valid) => [...ledger, valid]);
}

/**
 * Appends `entry` to the stored list as parsed, so items the reader skips
 * and keys it does not know are written back untouched. Corrupt history is
 * replaced by a one-entry list.
 */
export function appendStoredFact(
  raw: string | null | undefined,
  entry: FactEntry
): Result<string, ValidationError> {
  return ensureAppendable(entry).map((valid) =>
    JSON.stringify([...parseStoredList(raw), toStoredRow(valid)])
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Reading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keeps entries whose category equals `category` exactly (case-sensitive).
 * An absent or empty category keeps everything.
 */
export function filterByCategory(
  ledger: readonly FactEntry[],
  category: string | undefined
): FactEntry[] {
  if (category === undefined || category === '') {
    return [...ledger];
  }
  return ledger.filter((entry) => entry.category === category);
}

/**
 * Newest first. Entries without a readable timestamp sink to the end;
 * ties keep their relative order.
 */
export function sortByRecency(ledger: readonly FactEntry[]): FactEntry[] {
  const keyed = ledger.map((entry) => ({
    entry,
    time: parseFactTimestamp(entry.learnedAt) ?? Number.NEGATIVE_INFINITY,
  }));

  keyed.sort((a, b) => {
    if (a.time === b.time) {
      return 0;
    }
    return a.time < b.time ? 1 : -1;
  });

  return keyed.map(({ entry }) => entry);
}

/**
 * Validates a page size against [MIN_LIST_LIMIT, MAX_LIST_LIMIT].
 */
export function validateLimit(limit: number): Result<number, InvalidArgumentError> {
  if (!Number.isInteger(limit) || limit < MIN_LIST_LIMIT || limit > MAX_LIST_LIMIT) {
    return err(
      createInvalidArgumentError(
        'limit',
        `limit must be between ${String(MIN_LIST_LIMIT)} and ${String(MAX_LIST_LIMIT)}`
      )
    );
  }
  return ok(limit);
}

/**
 * Takes the first `limit` entries and reports the size of the whole list.
 */
export function paginate<T>(
  list: readonly T[],
  limit: number
): Result<FactPage<T>, InvalidArgumentError> {
  return validateLimit(limit).map((validLimit) => ({
    items: list.slice(0, validLimit),
    total: list.length,
  }));
}

/**
 * Caller-facing view of an entry.
 */
export function toFactView(entry: FactEntry): FactView {
  return {
    content: entry.content,
    ...(entry.category !== undefined && { category: entry.category }),
    ...(entry.sourceUrl !== undefined && { sourceUrl: entry.sourceUrl }),
    learnedAt: normalizeFactTimestamp(entry.learnedAt),
  };
}
