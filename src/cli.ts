#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { getProfile, listProfiles } from './profiles/registry';
import { run } from './engine/runner';
import { measure } from './engine/measure';
import { log } from './engine/logger';
import { RowpipeError } from './engine/errors';
import { parseLoadMode } from './engine/sink';
import type { Row } from './engine/types';
import type { TargetConfig } from './dialects/target';
import { describeTarget } from './dialects/connection-url';
import { loadConfig, DEFAULT_CONFIG_PATH, type AppConfig } from './config';
import { RetrievalService } from './services/retrieval';
import { AggregateReportingService } from './services/reporting';
import { parseOptionalInt, parseSort, parseWhere, splitList } from './cli-options';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_PATH },
    profile: { type: 'string', short: 'p', default: 'employees' },
    'batch-size': { type: 'string', short: 'b' },
    mode: { type: 'string', short: 'm' },
    'no-indexes': { type: 'boolean', default: false },
    where: { type: 'string', short: 'w', multiple: true },
    sort: { type: 'string', short: 's' },
    above: { type: 'string' },
    cities: { type: 'string' },
  },
});

const command = positionals[0] ?? 'load';

const resolveConfig = (): AppConfig => {
  const config = loadConfig(values.config ?? DEFAULT_CONFIG_PATH);
  const batchSize = parseOptionalInt(values['batch-size']);
  const mode = typeof values.mode === 'string' ? parseLoadMode(values.mode, 'cli') : undefined;

  const target: TargetConfig = {
    ...config.target,
    ...(batchSize !== undefined ? { batchSize } : {}),
    ...(mode !== undefined ? { mode } : {}),
  };
  return { source: config.source, target };
};

const printRows = (title: string, rows: readonly Row[]): void => {
  console.info(`\n${title} (${rows.length})`);
  if (rows.length > 0) {
    console.table(rows);
  }
};

const loadCommand = async (): Promise<void> => {
  const profile = getProfile(values.profile ?? 'employees');
  const config = resolveConfig();

  await measure('load', () =>
    run(profile, {
      source: config.source,
      target: config.target,
      provisionIndexes: !values['no-indexes'],
    })
  );
};

const queryCommand = async (): Promise<void> => {
  const profile = getProfile(values.profile ?? 'employees');
  const config = resolveConfig();
  const service = new RetrievalService(config.target, profile);
  log.info(`Querying ${describeTarget(config.target)}`);

  if (typeof values.above === 'string') {
    const threshold = Number(values.above);
    if (Number.isNaN(threshold)) {
      throw new Error(`Invalid --above "${values.above}": expected a number`);
    }
    const { result } = await measure('above-salary', () => service.aboveSalary(threshold));
    printRows(`Salary above ${threshold}`, result);
    return;
  }

  if (typeof values.cities === 'string') {
    const cities = splitList(values.cities);
    const { result } = await measure('by-cities', () => service.byCities(cities));
    printRows(`Employees in ${cities.join(', ')}`, result);
    return;
  }

  const criteria = parseWhere(profile.schema, values.where ?? []);
  const sort = typeof values.sort === 'string' ? parseSort(values.sort) : undefined;
  const { result } = await measure('query', () => service.query(criteria, sort));
  printRows('Matching rows', result);
};

const reportCommand = async (): Promise<void> => {
  const config = resolveConfig();
  const reports = new AggregateReportingService(config.target);
  log.info(`Reporting on ${describeTarget(config.target)}`);

  const { result } = await measure('report', async () => ({
    departments: await reports.departmentMetrics(),
    levels: await reports.levelMetrics(),
    distribution: await reports.departmentLevelDistribution(),
    bands: await reports.salaryBands(),
    occupations: await reports.salaryStatsByOccupation(),
  }));

  printRows('Department metrics', result.departments);
  printRows('Level metrics', result.levels);
  printRows('Department / level distribution', result.distribution);
  printRows('Salary bands', result.bands);
  printRows('Salary by occupation', result.occupations);
};

const printUsage = (): void => {
  console.info(`
Usage: tsx src/cli.ts <command> [options]

Available profiles: ${listProfiles().join(', ')}

Commands:
  load     Read the source file and load it into the target table (default)
  query    Ad-hoc retrieval over the loaded table
  report   Print the fixed aggregate reports

Options:
  -c, --config <path>        YAML config file (default: ${DEFAULT_CONFIG_PATH})
  -p, --profile <name>       Table profile (default: employees)
  -b, --batch-size <n>       Rows per write batch (overrides target.batch_size)
  -m, --mode <mode>          append | replace (overrides target.mode)
  --no-indexes               Skip index provisioning after a load
  -w, --where <col=value>    Filter (repeatable); comma-separated values mean "any of"
  -s, --sort <col[:dir]>     Sort column, dir asc (default) or desc
  --above <salary>           Employees with salary strictly above the value
  --cities <a,b,...>         Employees in any of the cities

Environment:
  DB_USER            Database user (postgresql targets)
  DB_PASSWORD        Database password (postgresql targets)
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'load':
      await loadCommand();
      break;
    case 'query':
      await queryCommand();
      break;
    case 'report':
      await reportCommand();
      break;
    default:
      printUsage();
      process.exit(1);
  }
};

main().catch((err) => {
  if (err instanceof RowpipeError) {
    log.error(`${err.name} [${err.operation}]: ${err.message}`);
  } else {
    log.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
