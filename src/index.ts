export * from './dialects';
export * from './engine/errors';
export type {
  Scalar,
  Row,
  RowSet,
  ColumnType,
  ColumnDefinition,
  TableSchema,
  LoadMode,
  ParseResult,
  TableProfile,
  LoadEvents,
  MetricsHook,
  RunnerConfig,
} from './engine/types';
export { LOAD_MODES } from './engine/types';
export { RelationalSink, parseLoadMode, indexName, type LoadOptions, type LoadResult } from './engine/sink';
export { run, type RunResult } from './engine/runner';
export { measure, type Measured, type OperationMetrics } from './engine/measure';
export { log, formatDbError } from './engine/logger';
export { CriteriaQueryBuilder } from './query/criteria';
export type { Criteria, Clause, SortSpec, SortDirection, CompiledQuery } from './query/types';
export { RetrievalService } from './services/retrieval';
export {
  AggregateReportingService,
  SALARY_BANDS,
  salaryBandFor,
  type SalaryBandLabel,
  type DepartmentMetrics,
  type LevelMetrics,
  type DepartmentLevelMetrics,
  type SalaryBandMetrics,
  type OccupationStats,
} from './services/reporting';
export { getProfile, listProfiles } from './profiles/registry';
export { default as employeesProfile, type EmployeeRecord } from './profiles/employees';
export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH, type AppConfig, type Environment } from './config';
