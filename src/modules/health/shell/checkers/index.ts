export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export {
  makeSchemaHealthChecker,
  findMissingColumns,
  LEDGER_COLUMNS,
  type SchemaHealthCheckerOptions,
} from './schema-checker.js';
