import type { Knex } from 'knex';
import type { TargetConfig, TargetDialect } from '../dialects/target';
import { withTarget } from '../dialects/target-registry';
import { isIdentifier, quoteIdentifier } from '../query/criteria';
import { buildValuesPlaceholder, chunk, rowsPerStatement } from './batch';
import { ConfigInvalidError, RowpipeError, SinkWriteFailedError, UnsupportedModeError } from './errors';
import { log, formatDbError } from './logger';
import {
  LOAD_MODES,
  type LoadEvents,
  type LoadMode,
  type MetricsHook,
  type Row,
  type RowSet,
  type TableProfile,
  type TableSchema,
} from './types';

// Import dialects to register them
import '../dialects/target/sqlite';
import '../dialects/target/postgresql';

export type LoadOptions = {
  /** Create indexes after the load on index-managed backends (default true) */
  provisionIndexes?: boolean;
  metrics?: MetricsHook;
};

export type LoadResult = {
  rowsWritten: number;
  batches: number;
  indexesProvisioned: number;
};

/**
 * Narrow a raw mode string to a LoadMode.
 */
export const parseLoadMode = (value: string, operation = 'load'): LoadMode => {
  const mode = LOAD_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new UnsupportedModeError(value, operation);
  }
  return mode;
};

const emitMetrics = <K extends keyof LoadEvents>(
  hooks: MetricsHook | undefined,
  name: K,
  params: LoadEvents[K]
): void => {
  const hook = hooks?.[name];
  if (hook) {
    hook(params);
  }
};

const defineColumns = (table: Knex.CreateTableBuilder, schema: TableSchema): void => {
  for (const column of schema) {
    switch (column.type) {
      case 'integer':
        table.integer(column.name);
        break;
      case 'numeric':
        table.double(column.name);
        break;
      case 'string':
        table.text(column.name);
        break;
    }
  }
};

export const indexName = (table: string, column: string): string => `idx_${table}_${column}`;

/**
 * Writes a RowSet into the target table.
 *
 * - `replace` drops and recreates the table from the declared schema, then inserts.
 * - `append` creates the table if it is missing and inserts after existing rows.
 *
 * Each batch commits in its own transaction. A failure mid-load leaves earlier
 * batches in place; nothing is rolled back across batches.
 */
export class RelationalSink<TRecord extends Row = Row> {
  private readonly columns: readonly string[];

  constructor(private readonly profile: TableProfile<TRecord>) {
    this.columns = profile.schema.map((column) => column.name);
  }

  async load(rows: RowSet<TRecord>, target: TargetConfig, options: LoadOptions = {}): Promise<LoadResult> {
    const mode = parseLoadMode(target.mode);

    if (!Number.isInteger(target.batchSize) || target.batchSize <= 0) {
      throw new ConfigInvalidError('target.batch_size', `expected a positive integer, got ${target.batchSize}`, 'load');
    }
    if (!isIdentifier(target.table)) {
      throw new ConfigInvalidError('target.table', `"${target.table}" is not a valid table name`, 'load');
    }

    const startTime = Date.now();
    const batches = chunk(rows, target.batchSize);

    emitMetrics(options.metrics, 'onStart', {
      profileName: this.profile.name,
      table: target.table,
      mode,
      rowCount: rows.length,
      batchSize: target.batchSize,
    });

    return withTarget(target, async (dialect) => {
      await this.attempt(dialect, `prepare table (${mode})`, () => this.prepareTable(dialect, mode));

      const perStatement = rowsPerStatement(target.batchSize, this.columns.length, dialect.maxBindings);
      let rowsWritten = 0;

      for (const [index, batch] of batches.entries()) {
        const batchStart = Date.now();
        const label = `insert batch ${index + 1}/${batches.length}`;
        await this.attempt(dialect, label, () => this.writeBatch(dialect, batch, perStatement));

        const elapsedMs = Date.now() - batchStart;
        rowsWritten += batch.length;
        log.db('inserted', batch.length, elapsedMs);
        emitMetrics(options.metrics, 'onBatchComplete', {
          batchIndex: index + 1,
          batchTotal: batches.length,
          rows: batch.length,
          elapsedMs,
        });
      }

      const indexesProvisioned =
        options.provisionIndexes !== false && dialect.managesIndexes ? await this.provisionIndexes(dialect) : 0;

      const result: LoadResult = { rowsWritten, batches: batches.length, indexesProvisioned };

      emitMetrics(options.metrics, 'onComplete', {
        profileName: this.profile.name,
        table: target.table,
        rowsWritten,
        batches: batches.length,
        indexesProvisioned,
        elapsedMs: Date.now() - startTime,
      });

      return result;
    });
  }

  private async prepareTable(dialect: TargetDialect, mode: LoadMode): Promise<void> {
    const knex = dialect.getClient();
    const { schema } = this.profile;

    switch (mode) {
      case 'replace':
        await knex.transaction(async (trx) => {
          await trx.schema.dropTableIfExists(dialect.table);
          await trx.schema.createTable(dialect.table, (table) => defineColumns(table, schema));
        });
        return;
      case 'append': {
        const exists = await knex.schema.hasTable(dialect.table);
        if (!exists) {
          await knex.schema.createTable(dialect.table, (table) => defineColumns(table, schema));
        }
        return;
      }
      default: {
        const unsupported: never = mode;
        throw new UnsupportedModeError(String(unsupported));
      }
    }
  }

  private async writeBatch(dialect: TargetDialect, batch: readonly TRecord[], perStatement: number): Promise<void> {
    const columnList = this.columns.map(quoteIdentifier).join(', ');

    await dialect.getClient().transaction(async (trx) => {
      for (const statementRows of chunk(batch, perStatement)) {
        const values = buildValuesPlaceholder(statementRows.length, this.columns.length);
        const bindings = statementRows.flatMap((row) => this.columns.map((column) => row[column] ?? null));
        await trx.raw(`INSERT INTO ${quoteIdentifier(dialect.table)} (${columnList}) VALUES ${values}`, bindings);
      }
    });
  }

  /**
   * Create-if-absent indexes, so repeated loads never collide with existing ones.
   */
  private async provisionIndexes(dialect: TargetDialect): Promise<number> {
    const knex = dialect.getClient();
    const start = Date.now();
    const indexColumns = this.profile.indexColumns.filter((column) => this.columns.includes(column));

    for (const column of indexColumns) {
      const name = indexName(dialect.table, column);
      await this.attempt(dialect, `create index ${name}`, async () => {
        await knex.raw(
          `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(name)} ON ${quoteIdentifier(dialect.table)} (${quoteIdentifier(column)})`
        );
      });
    }

    log.success(`Indexes ready on ${dialect.table} (${indexColumns.join(', ')}) in ${Date.now() - start}ms`);
    return indexColumns.length;
  }

  private async attempt<T>(dialect: TargetDialect, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RowpipeError) {
        throw err;
      }
      throw new SinkWriteFailedError(dialect.table, operation, formatDbError(err), err);
    }
  }
}
