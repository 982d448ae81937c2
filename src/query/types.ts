import type { Scalar } from '../engine/types';

/**
 * Caller-supplied filter: column → scalar (equality) or list (membership).
 * Clause order follows key insertion order.
 */
export type Criteria = Readonly<Record<string, Scalar | ReadonlyArray<Scalar>>>;

export type Clause =
  | { kind: 'equals'; column: string; value: Scalar }
  | { kind: 'in'; column: string; values: ReadonlyArray<Scalar> }
  | { kind: 'greaterThan'; column: string; value: Scalar };

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  column: string;
  direction: SortDirection;
}

/**
 * Parameterized SELECT. `sql` references each key of `bindings` exactly once
 * as a `:name` placeholder; values never appear in the SQL text.
 */
export interface CompiledQuery {
  sql: string;
  bindings: Record<string, Scalar>;
}
