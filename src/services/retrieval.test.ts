import path from 'node:path';
import { RetrievalService } from './retrieval';
import { QueryFailedError, UnknownColumnError } from '../engine/errors';
import { RelationalSink } from '../engine/sink';
import employeesProfile from '../profiles/employees';
import { createEmployee, makeTempDir, muteLogs, removeDir, sqliteTarget } from '../testing/helpers';

const EMPLOYEES = [
  createEmployee({ id: 1, name: 'Ana', city: 'Boston', department: 'Engineering', level: 'Senior', salary: 120000 }),
  createEmployee({ id: 2, name: 'Bo', city: 'Denver', department: 'Engineering', level: 'Junior', salary: 85000 }),
  createEmployee({ id: 3, name: 'Cy', city: 'Boston', department: 'Sales', level: 'Senior', salary: 95000 }),
  createEmployee({ id: 4, name: 'Di', city: 'Austin', department: 'Engineering', level: 'Mid', salary: 100000 }),
  createEmployee({ id: 5, name: 'Ed', city: 'Denver', department: 'Sales', level: 'Junior', salary: 80000 }),
];

describe('RetrievalService', () => {
  muteLogs();

  let dir: string;
  let service: RetrievalService<(typeof EMPLOYEES)[number]>;

  beforeEach(async () => {
    dir = makeTempDir();
    const target = sqliteTarget(dir);
    await new RelationalSink(employeesProfile).load(EMPLOYEES, target);
    service = new RetrievalService(target, employeesProfile);
  });

  afterEach(() => {
    removeDir(dir);
  });

  const ids = (rows: ReadonlyArray<{ id: number }>): number[] => rows.map((row) => row.id);

  it('filters by equality and sorts by salary, highest first', async () => {
    const rows = await service.query({ department: 'Engineering' }, { column: 'salary', direction: 'desc' });

    expect(ids(rows)).toEqual([1, 4, 2]);
    expect(rows[0]).toEqual(EMPLOYEES[0]);
  });

  it('returns only the matching department, highest salary first', async () => {
    const target = sqliteTarget(dir, { file: 'small.db' });
    await new RelationalSink(employeesProfile).load(
      [
        createEmployee({ id: 1, department: 'Engineering', salary: 90000 }),
        createEmployee({ id: 2, department: 'Engineering', salary: 120000 }),
        createEmployee({ id: 3, department: 'Operations', salary: 95000 }),
      ],
      target
    );

    const rows = await new RetrievalService(target, employeesProfile).query(
      { department: 'Engineering' },
      { column: 'salary', direction: 'desc' }
    );

    expect(rows.map(({ department, salary }) => ({ department, salary }))).toEqual([
      { department: 'Engineering', salary: 120000 },
      { department: 'Engineering', salary: 90000 },
    ]);
  });

  it('combines criteria with AND', async () => {
    const rows = await service.query({ department: 'Sales', level: 'Junior' });

    expect(ids(rows)).toEqual([5]);
  });

  it('matches numeric criteria', async () => {
    const rows = await service.query({ salary: 95000 });

    expect(ids(rows)).toEqual([3]);
  });

  it('returns every row whose value is in a membership list', async () => {
    const rows = await service.query({ city: ['Boston', 'Denver'] }, { column: 'id', direction: 'asc' });

    expect(ids(rows)).toEqual([1, 2, 3, 5]);
  });

  it('returns an empty list when nothing matches', async () => {
    await expect(service.query({ city: 'Chicago' })).resolves.toEqual([]);
  });

  it('reverses the order between ascending and descending sorts', async () => {
    const ascending = await service.query({}, { column: 'salary', direction: 'asc' });
    const descending = await service.query({}, { column: 'salary', direction: 'desc' });

    expect(ids(ascending)).toEqual([5, 2, 3, 4, 1]);
    expect(ids(descending)).toEqual(ids(ascending).reverse());
  });

  it('keeps only salaries strictly above the threshold', async () => {
    expect(ids(await service.aboveSalary(100000))).toEqual([1]);
    expect(ids(await service.aboveSalary(95000))).toEqual([1, 4]);
  });

  it('lists employees of the given cities by city, then highest salary', async () => {
    const rows = await service.byCities(['Denver', 'Boston']);

    expect(ids(rows)).toEqual([1, 3, 2, 5]);
  });

  it('rejects an unknown column before opening a connection', async () => {
    const unreachable = new RetrievalService(
      { ...sqliteTarget(dir), database: path.join(dir, 'missing', 'test.db') },
      employeesProfile
    );

    await expect(unreachable.query({ salary_band: 'High' })).rejects.toBeInstanceOf(UnknownColumnError);
    await expect(unreachable.query({}, { column: 'bonus', direction: 'asc' })).rejects.toBeInstanceOf(
      UnknownColumnError
    );
  });

  it('raises QueryFailed when the backend rejects the query', async () => {
    const missingTable = new RetrievalService(sqliteTarget(dir, { table: 'contractors' }), employeesProfile);

    await expect(missingTable.query()).rejects.toBeInstanceOf(QueryFailedError);
  });
});
