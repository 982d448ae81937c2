import { log } from './logger';

export type OperationMetrics = {
  label: string;
  elapsedMs: number;
  /** Resident set size change across the operation, in MB */
  rssDeltaMb: number;
  /** Resident set size after the operation, in MB */
  rssMb: number;
};

export type Measured<T> = {
  result: T;
  metrics: OperationMetrics;
};

const toMb = (bytes: number): number => bytes / 1024 / 1024;

/**
 * Run an operation and report how long it took and how memory moved.
 * Callers compose this explicitly around whatever they want timed.
 */
export const measure = async <T>(label: string, operation: () => Promise<T>): Promise<Measured<T>> => {
  const rssBefore = process.memoryUsage().rss;
  const start = Date.now();

  const result = await operation();

  const elapsedMs = Date.now() - start;
  const rssAfter = process.memoryUsage().rss;
  const metrics: OperationMetrics = {
    label,
    elapsedMs,
    rssDeltaMb: toMb(rssAfter - rssBefore),
    rssMb: toMb(rssAfter),
  };

  log.perf(label, metrics);
  return { result, metrics };
};
