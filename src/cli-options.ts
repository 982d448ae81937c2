import type { Scalar, TableSchema } from './engine/types';
import type { Criteria, SortSpec } from './query/types';

export const parseOptionalInt = (raw: unknown): number | undefined => {
  if (typeof raw !== 'string') return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) return undefined;
  return parsed;
};

export const splitList = (raw: string): string[] =>
  raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');

/**
 * Numeric columns get numbers so comparisons stay numeric on every backend.
 */
export const coerceValue = (schema: TableSchema, column: string, raw: string): Scalar => {
  const definition = schema.find((candidate) => candidate.name === column);
  if (!definition || definition.type === 'string') return raw;

  const parsed = raw.trim() === '' ? Number.NaN : Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid --where value "${raw}" for ${column}: expected a number`);
  }
  return parsed;
};

/**
 * `column=value` entries to criteria. Comma-separated values mean membership.
 * Unknown columns are kept so the query builder can reject them.
 */
export const parseWhere = (schema: TableSchema, entries: readonly string[]): Criteria => {
  const criteria = new Map<string, Scalar | Scalar[]>();
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid --where "${entry}": expected column=value`);
    }
    const column = entry.slice(0, separator).trim();
    const raw = entry.slice(separator + 1);
    criteria.set(
      column,
      raw.includes(',')
        ? splitList(raw).map((item) => coerceValue(schema, column, item))
        : coerceValue(schema, column, raw.trim())
    );
  }
  return Object.fromEntries(criteria);
};

export const parseSort = (raw: string): SortSpec => {
  const [column, direction = 'asc'] = raw.split(':');
  if (direction === 'asc' || direction === 'desc') {
    return { column, direction };
  }
  throw new Error(`Invalid --sort direction "${direction}": expected asc or desc`);
};
