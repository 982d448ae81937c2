import { z } from 'zod';
import type { TargetConfig } from '../dialects/target';
import { withTarget } from '../dialects/target-registry';
import type { Scalar } from '../engine/types';
import { QueryFailedError } from '../engine/errors';
import { formatDbError } from '../engine/logger';
import type { RowParser } from '../profiles/fields';

// Import dialects to register them
import '../dialects/target/sqlite';
import '../dialects/target/postgresql';

const ResultRowsSchema = z.array(z.record(z.unknown()));

// better-sqlite3 hands back the row array itself, pg wraps it in { rows }
const RawResultSchema = z.union([
  ResultRowsSchema,
  z.object({ rows: ResultRowsSchema }).transform((result) => result.rows),
]);

export type SelectStatement = {
  sql: string;
  bindings?: Record<string, Scalar>;
};

/**
 * Run one SELECT on a fresh connection and type every row with `parseRow`.
 * Backend and coercion failures both surface as QueryFailedError.
 */
export const runSelect = async <T>(
  target: TargetConfig,
  statement: SelectStatement,
  parseRow: RowParser<T>,
  operation: string
): Promise<T[]> => {
  const raw = await withTarget(target, async (dialect) => {
    try {
      const result: unknown = await dialect.getClient().raw(statement.sql, statement.bindings ?? {});
      return result;
    } catch (err) {
      throw new QueryFailedError(target.table, operation, formatDbError(err), err);
    }
  });

  const rows = RawResultSchema.safeParse(raw);
  if (!rows.success) {
    throw new QueryFailedError(target.table, operation, 'unexpected result shape from backend');
  }

  return rows.data.map((row, idx) => {
    const parsed = parseRow(row);
    if (!parsed.ok) {
      throw new QueryFailedError(target.table, operation, `row ${idx + 1}: ${parsed.reason}`);
    }
    return parsed.record;
  });
};
