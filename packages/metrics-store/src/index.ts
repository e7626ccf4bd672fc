export {
  MetricsStore,
  type AppendResult,
  type RevisionBatchInsertResult,
  type TrackerBatchInsertResult,
} from "./metrics-store.js";
export { RowValidationError } from "./errors.js";
export {
  resolveRevisionKeys,
  type RevisionKeys,
  type StoredReferenceLookup,
} from "./resolve-revision-keys.js";
export { TABLES, TRACKER_TABLES, type TrackerTables } from "./schema/tables.js";
export type { TableDefinition } from "./schema/table-definition.js";
