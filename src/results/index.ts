export {
  RUN_STATUSES,
  RESULTS_COLUMNS,
  runRecordSchema,
  createRunRecord,
  serialize,
  deserialize,
  writeResults,
  readResults,
  pivotRuntimes,
  type RunStatus,
  type RunRecord,
  type ResultsTable,
  type RuntimeSeries,
  type RuntimePivot,
} from './table.js';
