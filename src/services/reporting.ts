import { z } from 'zod';
import type { TargetConfig } from '../dialects/target';
import { ConfigInvalidError } from '../engine/errors';
import { isIdentifier, quoteIdentifier } from '../query/criteria';
import { integerField, numericField, textField, zodRowParser } from '../profiles/fields';
import { runSelect } from './select';

/**
 * Closed-open salary bands, lowest first. Together they cover every salary exactly once.
 */
export const SALARY_BANDS = [
  { label: 'Entry', min: null, max: 80_000 },
  { label: 'Medium', min: 80_000, max: 100_000 },
  { label: 'High', min: 100_000, max: 120_000 },
  { label: 'Very High', min: 120_000, max: null },
] as const;

export type SalaryBandLabel = (typeof SALARY_BANDS)[number]['label'];

export const salaryBandFor = (salary: number): SalaryBandLabel => {
  const band = SALARY_BANDS.find(
    ({ min, max }) => (min === null || salary >= min) && (max === null || salary < max)
  );
  if (!band) {
    throw new Error(`Salary ${salary} does not fall in any band`);
  }
  return band.label;
};

// Highest band first so each WHEN only needs its lower bound
const salaryBandCase = (column: string): string => {
  const whens = [...SALARY_BANDS]
    .reverse()
    .flatMap((band) => (band.min === null ? [] : [`WHEN ${column} >= ${band.min} THEN '${band.label}'`]));
  const fallback = SALARY_BANDS.find((band) => band.min === null);
  return `CASE ${whens.join(' ')} ELSE '${fallback?.label ?? 'Entry'}' END`;
};

const salaryStats = {
  employee_count: integerField,
  avg_salary: numericField,
  min_salary: numericField,
  max_salary: numericField,
};

const DepartmentMetricsSchema = z.object({ department: textField, ...salaryStats, total_payroll: numericField });
const LevelMetricsSchema = z.object({ level: textField, ...salaryStats, total_payroll: numericField });
const DepartmentLevelSchema = z.object({
  department: textField,
  level: textField,
  employee_count: integerField,
  avg_salary: numericField,
});
const SalaryBandSchema = z.object({
  salary_band: z.enum(['Entry', 'Medium', 'High', 'Very High']),
  ...salaryStats,
});
const OccupationStatsSchema = z.object({
  occupation: textField,
  count: integerField,
  avg_salary: numericField,
  min_salary: numericField,
  max_salary: numericField,
});

export type DepartmentMetrics = z.infer<typeof DepartmentMetricsSchema>;
export type LevelMetrics = z.infer<typeof LevelMetricsSchema>;
export type DepartmentLevelMetrics = z.infer<typeof DepartmentLevelSchema>;
export type SalaryBandMetrics = z.infer<typeof SalaryBandSchema>;
export type OccupationStats = z.infer<typeof OccupationStatsSchema>;

/**
 * Fixed grouping reports over the employee table.
 * Each report is a single query over the whole table.
 */
export class AggregateReportingService {
  private readonly table: string;

  constructor(private readonly target: TargetConfig) {
    if (!isIdentifier(target.table)) {
      throw new ConfigInvalidError('target.table', `"${target.table}" is not a valid table name`, 'report');
    }
    this.table = quoteIdentifier(target.table);
  }

  /** Per department, biggest payroll first */
  async departmentMetrics(): Promise<DepartmentMetrics[]> {
    const sql = `
      SELECT
        "department",
        COUNT(*) AS employee_count,
        AVG("salary") AS avg_salary,
        MIN("salary") AS min_salary,
        MAX("salary") AS max_salary,
        SUM("salary") AS total_payroll
      FROM ${this.table}
      GROUP BY "department"
      ORDER BY total_payroll DESC
    `;
    return runSelect(this.target, { sql }, zodRowParser(DepartmentMetricsSchema), 'department-metrics');
  }

  /** Per level, best paid first */
  async levelMetrics(): Promise<LevelMetrics[]> {
    const sql = `
      SELECT
        "level",
        COUNT(*) AS employee_count,
        AVG("salary") AS avg_salary,
        MIN("salary") AS min_salary,
        MAX("salary") AS max_salary,
        SUM("salary") AS total_payroll
      FROM ${this.table}
      GROUP BY "level"
      ORDER BY avg_salary DESC
    `;
    return runSelect(this.target, { sql }, zodRowParser(LevelMetricsSchema), 'level-metrics');
  }

  async departmentLevelDistribution(): Promise<DepartmentLevelMetrics[]> {
    const sql = `
      SELECT
        "department",
        "level",
        COUNT(*) AS employee_count,
        AVG("salary") AS avg_salary
      FROM ${this.table}
      GROUP BY "department", "level"
      ORDER BY "department" ASC, avg_salary DESC
    `;
    return runSelect(this.target, { sql }, zodRowParser(DepartmentLevelSchema), 'department-level-distribution');
  }

  /** Only bands that have at least one employee appear */
  async salaryBands(): Promise<SalaryBandMetrics[]> {
    const sql = `
      SELECT
        ${salaryBandCase('"salary"')} AS salary_band,
        COUNT(*) AS employee_count,
        AVG("salary") AS avg_salary,
        MIN("salary") AS min_salary,
        MAX("salary") AS max_salary
      FROM ${this.table}
      GROUP BY salary_band
      ORDER BY min_salary ASC
    `;
    return runSelect(this.target, { sql }, zodRowParser(SalaryBandSchema), 'salary-bands');
  }

  async salaryStatsByOccupation(): Promise<OccupationStats[]> {
    const sql = `
      SELECT
        "occupation",
        COUNT(*) AS count,
        AVG("salary") AS avg_salary,
        MIN("salary") AS min_salary,
        MAX("salary") AS max_salary
      FROM ${this.table}
      GROUP BY "occupation"
      ORDER BY avg_salary DESC
    `;
    return runSelect(this.target, { sql }, zodRowParser(OccupationStatsSchema), 'occupation-stats');
  }
}
