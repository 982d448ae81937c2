/**
 * Split items into consecutive slices of at most `size`, preserving order.
 */
export const chunk = <T>(items: ReadonlyArray<T>, size: number): T[][] => {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Rows per INSERT statement: the batch size, capped so one statement never
 * exceeds the backend's bound-parameter limit.
 */
export const rowsPerStatement = (batchSize: number, columnCount: number, maxBindings: number): number => {
  const byBindings = Math.floor(maxBindings / Math.max(columnCount, 1));
  return Math.max(1, Math.min(batchSize, byBindings));
};

export const buildValuesPlaceholder = (rowCount: number, columnCount: number): string => {
  const row = `(${Array.from({ length: columnCount }, () => '?').join(', ')})`;
  return Array.from({ length: rowCount }, () => row).join(', ');
};
