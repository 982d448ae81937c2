import type { TargetConfig } from '../dialects/target';
import type { Row, TableProfile } from '../engine/types';
import { CriteriaQueryBuilder } from '../query/criteria';
import type { Clause, CompiledQuery, Criteria, SortSpec } from '../query/types';
import { runSelect } from './select';

/**
 * Ad-hoc lookups over the loaded table. Every call compiles first, so
 * caller-input errors are raised before a connection is opened.
 */
export class RetrievalService<TRecord extends Row = Row> {
  private readonly builder: CriteriaQueryBuilder;

  constructor(
    private readonly target: TargetConfig,
    private readonly profile: TableProfile<TRecord>,
  ) {
    this.builder = new CriteriaQueryBuilder(target.table, profile.schema);
  }

  /** All rows matching every criterion, in backend order unless sorted */
  async query(criteria: Criteria = {}, sort?: SortSpec | readonly SortSpec[]): Promise<TRecord[]> {
    return this.execute(this.builder.compile(criteria, sort), 'query');
  }

  /** Rows matching explicit clauses (equality, membership, strict greater-than) */
  async queryClauses(clauses: readonly Clause[], sort?: SortSpec | readonly SortSpec[]): Promise<TRecord[]> {
    return this.execute(this.builder.compileClauses(clauses, sort), 'query');
  }

  /** Salary strictly above the threshold, highest first */
  async aboveSalary(threshold: number): Promise<TRecord[]> {
    return this.queryClauses([{ kind: 'greaterThan', column: 'salary', value: threshold }], {
      column: 'salary',
      direction: 'desc',
    });
  }

  /** Employees in any of the cities, by city then highest salary */
  async byCities(cities: readonly string[]): Promise<TRecord[]> {
    return this.query({ city: cities }, [
      { column: 'city', direction: 'asc' },
      { column: 'salary', direction: 'desc' },
    ]);
  }

  private async execute(compiled: CompiledQuery, operation: string): Promise<TRecord[]> {
    return runSelect(this.target, compiled, this.profile.parseRecord, operation);
  }
}
