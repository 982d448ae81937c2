import { buildValuesPlaceholder, chunk, rowsPerStatement } from './batch';

describe('chunk', () => {
  it('splits items into ordered slices with a short tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no slices for no items', () => {
    expect(chunk([], 3)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow('Chunk size must be a positive integer, got 0');
    expect(() => chunk([1], 1.5)).toThrow('Chunk size must be a positive integer, got 1.5');
  });
});

describe('rowsPerStatement', () => {
  it('keeps the batch size when it fits the binding limit', () => {
    expect(rowsPerStatement(1000, 8, 32_766)).toBe(1000);
  });

  it('caps rows so one statement stays under the binding limit', () => {
    expect(rowsPerStatement(10_000, 8, 32_766)).toBe(4095);
    expect(rowsPerStatement(10_000, 8, 65_535)).toBe(8191);
  });

  it('never drops below one row', () => {
    expect(rowsPerStatement(10, 100, 50)).toBe(1);
  });
});

describe('buildValuesPlaceholder', () => {
  it('repeats one placeholder tuple per row', () => {
    expect(buildValuesPlaceholder(2, 3)).toBe('(?, ?, ?), (?, ?, ?)');
  });
});
