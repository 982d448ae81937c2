import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { TargetConfig } from '../dialects/target';
import { withTarget } from '../dialects/target-registry';
import type { LoadMode } from '../engine/types';
import type { EmployeeRecord } from '../profiles/employees';

export const createEmployee = (overrides: Partial<EmployeeRecord>): EmployeeRecord => {
  return {
    id: overrides.id ?? 1,
    name: overrides.name ?? 'Test User',
    age: overrides.age ?? 30,
    city: overrides.city ?? 'Boston',
    department: overrides.department ?? 'Engineering',
    level: overrides.level ?? 'Senior',
    occupation: overrides.occupation ?? 'Engineer',
    salary: overrides.salary ?? 90000,
  };
};

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'rowpipe-'));

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

export const sqliteTarget = (
  dir: string,
  overrides: { mode?: LoadMode; batchSize?: number; table?: string; file?: string } = {}
): TargetConfig => ({
  type: 'sqlite',
  database: path.join(dir, overrides.file ?? 'test.db'),
  table: overrides.table ?? 'employees',
  mode: overrides.mode ?? 'append',
  batchSize: overrides.batchSize ?? 10_000,
});

const NameRowsSchema = z.array(z.object({ name: z.string() }));

/** Index names SQLite knows for the target table, sorted */
export const listIndexes = async (target: TargetConfig): Promise<string[]> => {
  const result = await withTarget(target, async (dialect) => {
    const rows: unknown = await dialect
      .getClient()
      .raw("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? ORDER BY name", [target.table]);
    return rows;
  });
  return NameRowsSchema.parse(result).map((row) => row.name);
};

/** Silence the console logger for the duration of a test file */
export const muteLogs = (): void => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
};
