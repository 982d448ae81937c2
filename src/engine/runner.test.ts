import fs from 'node:fs';
import path from 'node:path';
import { run } from './runner';
import { SourceReadFailedError } from './errors';
import employeesProfile from '../profiles/employees';
import { RetrievalService } from '../services/retrieval';
import { listIndexes, makeTempDir, muteLogs, removeDir, sqliteTarget } from '../testing/helpers';

const CSV = [
  'id,name,age,city,occupation,department,level,salary',
  '1,Ana Lima,34,Boston,Engineer,Engineering,Senior,120000',
  '2,Bo Chen,28,Denver,Engineer,Engineering,Junior,85000.50',
  '3,Cy Park,45,Boston,Manager,Sales,Senior,95000',
  '',
].join('\n');

describe('run', () => {
  muteLogs();

  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  const writeSource = (content: string): string => {
    const filePath = path.join(dir, 'employees.csv');
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  it('loads a delimited file into the target table', async () => {
    const filePath = writeSource(CSV);
    const target = sqliteTarget(dir, { mode: 'replace', batchSize: 2 });

    const result = await run(employeesProfile, {
      source: { type: 'delimited-file', filePath, delimiter: ',', header: true },
      target,
    });

    expect(result).toMatchObject({ rowsRead: 3, rowsWritten: 3, batches: 2, indexesProvisioned: 3 });
    expect(await listIndexes(target)).toHaveLength(3);

    const rows = await new RetrievalService(target, employeesProfile).query({}, { column: 'id', direction: 'asc' });
    expect(rows[1]).toEqual({
      id: 2,
      name: 'Bo Chen',
      age: 28,
      city: 'Denver',
      department: 'Engineering',
      level: 'Junior',
      occupation: 'Engineer',
      salary: 85000.5,
    });
    expect(rows.map((row) => row.id)).toEqual([1, 2, 3]);
  });

  it('leaves the target untouched when a record cannot be typed', async () => {
    const filePath = writeSource(CSV.replace('45,Boston', 'forty-five,Boston'));
    const target = sqliteTarget(dir, { mode: 'replace' });

    await expect(
      run(employeesProfile, {
        source: { type: 'delimited-file', filePath, delimiter: ',', header: true },
        target,
      })
    ).rejects.toThrow(`Failed to read ${filePath}: record 3: age: Expected number, received nan`);
    expect(fs.existsSync(target.database)).toBe(false);
  });

  it('propagates source failures', async () => {
    await expect(
      run(employeesProfile, {
        source: { type: 'delimited-file', filePath: path.join(dir, 'absent.csv'), delimiter: ',', header: true },
        target: sqliteTarget(dir),
      })
    ).rejects.toBeInstanceOf(SourceReadFailedError);
  });
});
