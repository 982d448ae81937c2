import type { Scalar, TableSchema } from '../engine/types';
import { ConfigInvalidError, EmptyCriteriaValueError, UnknownColumnError } from '../engine/errors';
import type { Clause, CompiledQuery, Criteria, SortSpec } from './types';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isIdentifier = (value: string): boolean => IDENTIFIER.test(value);

export const quoteIdentifier = (identifier: string): string => `"${identifier}"`;

const isList = (value: Scalar | ReadonlyArray<Scalar>): value is ReadonlyArray<Scalar> => Array.isArray(value);

const isSortList = (sort: SortSpec | readonly SortSpec[]): sort is readonly SortSpec[] => Array.isArray(sort);

/**
 * Compiles criteria and sort keys into a parameterized SELECT over one table.
 * Column names cannot be bound, so each one is checked against the declared
 * schema before it is embedded (quoted) in the SQL text.
 */
export class CriteriaQueryBuilder {
  private readonly allowed: readonly string[];

  constructor(
    readonly table: string,
    schema: TableSchema,
  ) {
    if (!isIdentifier(table)) {
      throw new ConfigInvalidError('target.table', `"${table}" is not a valid table name`, 'compile-query');
    }
    this.allowed = schema.map((column) => column.name);
  }

  get columns(): readonly string[] {
    return this.allowed;
  }

  /**
   * Turn a criteria map into validated clauses.
   * Lists become membership clauses, scalars equality clauses.
   */
  clausesFrom(criteria: Criteria): Clause[] {
    return Object.entries(criteria).map(([column, value]): Clause => {
      this.assertColumn(column, 'criteria');
      if (isList(value)) {
        if (value.length === 0) {
          throw new EmptyCriteriaValueError(column, 'criteria');
        }
        return { kind: 'in', column, values: value };
      }
      return { kind: 'equals', column, value };
    });
  }

  compile(criteria: Criteria, sort?: SortSpec | readonly SortSpec[]): CompiledQuery {
    return this.compileClauses(this.clausesFrom(criteria), sort);
  }

  compileClauses(clauses: readonly Clause[], sort?: SortSpec | readonly SortSpec[]): CompiledQuery {
    const sortKeys: readonly SortSpec[] = sort === undefined ? [] : isSortList(sort) ? sort : [sort];

    // Validate everything before emitting anything
    for (const clause of clauses) {
      this.assertColumn(clause.column, 'criteria');
      if (clause.kind === 'in' && clause.values.length === 0) {
        throw new EmptyCriteriaValueError(clause.column, 'criteria');
      }
    }
    for (const key of sortKeys) {
      this.assertColumn(key.column, 'sort');
    }

    const bindings: Record<string, Scalar> = {};
    const counter = { n: 0 };
    const bind = (column: string, value: Scalar): string => {
      const name = `${column}_${counter.n}`;
      counter.n += 1;
      bindings[name] = value;
      return `:${name}`;
    };

    const conditions = clauses.map((clause) => {
      const column = quoteIdentifier(clause.column);
      switch (clause.kind) {
        case 'equals':
          return `${column} = ${bind(clause.column, clause.value)}`;
        case 'greaterThan':
          return `${column} > ${bind(clause.column, clause.value)}`;
        case 'in':
          return `${column} IN (${clause.values.map((value) => bind(clause.column, value)).join(', ')})`;
      }
    });

    const parts = [`SELECT * FROM ${quoteIdentifier(this.table)}`];
    if (conditions.length > 0) {
      parts.push(`WHERE ${conditions.join(' AND ')}`);
    }
    if (sortKeys.length > 0) {
      const order = sortKeys.map((key) => `${quoteIdentifier(key.column)} ${key.direction === 'desc' ? 'DESC' : 'ASC'}`);
      parts.push(`ORDER BY ${order.join(', ')}`);
    }

    return { sql: parts.join(' '), bindings };
  }

  private assertColumn(column: string, operation: string): void {
    if (!this.allowed.includes(column)) {
      throw new UnknownColumnError(column, this.allowed, operation);
    }
  }
}
