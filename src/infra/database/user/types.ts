import type { ColumnType, Generated } from 'kysely';

// DATE column; read back as text (YYYY-MM-DD) to stay out of the driver's local-time parsing
export type CalendarDateColumn = ColumnType<string | null, string | null, string | null>;

// Users Table
// The account columns (id, username, password) are owned by the auth layer.
// The ledger columns below are the only ones this service writes.
export interface Users {
  id: Generated<number>;
  username: string;
  // JSON array of facts, kept as TEXT so corrupt history stays readable as a string
  facts_learned: Generated<string | null>;
  current_streak: Generated<number | null>;
  longest_streak: Generated<number | null>;
  total_facts_count: Generated<number | null>;
  last_activity_date: CalendarDateColumn;
  // Row version for compare-and-swap appends
  version: Generated<number>;
}

// Database Schema Interface
// Note: Keys must be lowercase to match PostgreSQL's default identifier handling.
export interface UserDatabase {
  users: Users;
}
