/**
 * Source dialect interface.
 * Implement this to read records from any tabular source.
 */
export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Human-readable location of the data, for logs */
  readonly location: string;

  /**
   * Read every record into memory, keyed by the given column names.
   * Values stay raw strings; typing is the profile's job.
   */
  readRecords(columns: readonly string[]): Promise<Array<Record<string, string>>>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for source dialects
 */
export type SourceConfig = {
  type: 'delimited-file';
  filePath: string;
  /** Exactly one character */
  delimiter: string;
  /** Whether the first line holds column names */
  header: boolean;
};
