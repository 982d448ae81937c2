import type { SourceConfig } from '../dialects/source';
import type { TargetConfig } from '../dialects/target';

export type Scalar = string | number;

/** One row of a table, keyed by column name */
export type Row = Record<string, Scalar | null>;

/** Ordered rows sharing one schema; built per ingestion run and consumed once by the sink */
export type RowSet<T extends Row = Row> = ReadonlyArray<T>;

export type ColumnType = 'integer' | 'string' | 'numeric';

export type ColumnDefinition = {
  name: string;
  type: ColumnType;
};

/** Declared target schema. Column order drives DDL, positional reads and insert order. */
export type TableSchema = ReadonlyArray<ColumnDefinition>;

export const LOAD_MODES = ['append', 'replace'] as const;

export type LoadMode = (typeof LOAD_MODES)[number];

export type ParseResult<T> = { ok: true; record: T } | { ok: false; reason: string };

/**
 * Contract that each table profile implements.
 * The engine is generic; the profile owns the schema and record coercion.
 */
export type TableProfile<TRecord extends Row = Row> = {
  /** Profile name, used in logs and the CLI */
  name: string;

  /** Declared columns of the target table */
  schema: TableSchema;

  /** Coerce a raw record (from a file or a result set) into a typed one */
  parseRecord: (raw: Record<string, unknown>) => ParseResult<TRecord>;

  /** Columns indexed after a load on index-managed backends */
  indexColumns: readonly string[];
};

/**
 * Payloads of the load lifecycle events, keyed by hook name.
 */
export type LoadEvents = {
  /** Called before the first batch is written */
  onStart: {
    profileName: string;
    table: string;
    mode: LoadMode;
    rowCount: number;
    batchSize: number;
  };

  /** Called after each committed batch */
  onBatchComplete: {
    batchIndex: number;
    batchTotal: number;
    rows: number;
    elapsedMs: number;
  };

  /** Called once the load (and index provisioning) succeeded */
  onComplete: {
    profileName: string;
    table: string;
    rowsWritten: number;
    batches: number;
    indexesProvisioned: number;
    elapsedMs: number;
  };
};

/** Optional hooks for monitoring a load */
export type MetricsHook = {
  [K in keyof LoadEvents]?: (params: LoadEvents[K]) => void;
};

export type RunnerConfig = {
  source: SourceConfig;
  target: TargetConfig;
  /** Defaults to true; only index-managed backends act on it */
  provisionIndexes?: boolean;
  metrics?: MetricsHook;
};
