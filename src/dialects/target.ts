import type { Knex } from 'knex';
import type { LoadMode } from '../engine/types';
import { log } from '../engine/logger';

/**
 * Target dialect interface.
 * Implement this to write to and read from a relational backend.
 */
export interface TargetDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Target table */
  readonly table: string;

  /** Whether loads provision indexes on this backend (embedded backends only) */
  readonly managesIndexes: boolean;

  /** Largest number of bound parameters a single statement may carry */
  readonly maxBindings: number;

  /** Get the underlying query builder */
  getClient(): Knex;

  /** Release the connection pool */
  close(): Promise<void>;
}

type TargetCommon = {
  table: string;
  mode: LoadMode;
  /** Rows per write batch */
  batchSize: number;
};

/**
 * Configuration for target dialects
 */
export type TargetConfig =
  | ({ type: 'sqlite'; database: string } & TargetCommon)
  | ({
      type: 'postgresql';
      host: string;
      port: number;
      user: string;
      password: string;
      database: string;
      ssl: boolean;
    } & TargetCommon);

export type TargetType = TargetConfig['type'];

export const DEFAULT_BATCH_SIZE = 10_000;

/** Route Knex's own diagnostics through the project logger */
export const knexLog: Knex.Logger = {
  warn(message: string) {
    log.knex.warn(message);
  },
  error(message: string) {
    log.knex.error(message);
  },
  deprecate(message: string) {
    log.knex.warn(`deprecated: ${message}`);
  },
  debug() {},
};
