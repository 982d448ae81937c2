import type { Row, RunnerConfig, TableProfile } from './types';
import { SourceReadFailedError } from './errors';
import { log, formatNumber } from './logger';
import { RelationalSink } from './sink';
import { withSource } from '../dialects/source-registry';
import { describeTarget } from '../dialects/connection-url';

// Import dialects to register them
import '../dialects/source/delimited-file';

export type RunResult = {
  rowsRead: number;
  rowsWritten: number;
  batches: number;
  indexesProvisioned: number;
  elapsedMs: number;
};

/**
 * One ingestion run: read the whole source, type every record through the
 * profile, then hand the RowSet to the sink.
 */
export const run = async <TRecord extends Row>(
  profile: TableProfile<TRecord>,
  config: RunnerConfig
): Promise<RunResult> => {
  const startTime = Date.now();

  return withSource(config.source, async (source) => {
    log.ingest.start({
      profile: profile.name,
      source: source.location,
      target: describeTarget(config.target),
      mode: config.target.mode,
      batchSize: config.target.batchSize,
    });

    // 1. Read raw records
    const columns = profile.schema.map((column) => column.name);
    const rawRecords = await source.readRecords(columns);
    log.info(`Read ${formatNumber(rawRecords.length)} records via ${source.name}`);

    // 2. Type them; the first bad record fails the run before anything is written
    const rows = rawRecords.map((raw, idx) => {
      const parsed = profile.parseRecord(raw);
      if (!parsed.ok) {
        throw new SourceReadFailedError(source.location, `record ${idx + 1}: ${parsed.reason}`);
      }
      return parsed.record;
    });

    // 3. Write
    const loaded = await new RelationalSink(profile).load(rows, config.target, {
      provisionIndexes: config.provisionIndexes,
      metrics: config.metrics,
    });

    const elapsedMs = Date.now() - startTime;

    log.ingest.summary({
      read: rows.length,
      written: loaded.rowsWritten,
      batches: loaded.batches,
      indexes: loaded.indexesProvisioned,
      elapsed: elapsedMs,
    });

    return { rowsRead: rows.length, ...loaded, elapsedMs };
  });
};
