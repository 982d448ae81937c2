import fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { SourceDialect, SourceConfig } from '../source';
import { registerSource } from '../source-registry';
import { SourceReadFailedError } from '../../engine/errors';

const ParsedLinesSchema = z.array(z.array(z.string()));

/**
 * Delimited-file source dialect (CSV, TSV, pipe-separated...).
 * The whole file is read into memory; there is no streaming.
 */
class DelimitedFileSource implements SourceDialect {
  readonly name = 'delimited-file';

  private readonly filePath: string;
  private readonly delimiter: string;
  private readonly header: boolean;

  constructor(config: SourceConfig) {
    this.filePath = config.filePath;
    this.delimiter = config.delimiter;
    this.header = config.header;
  }

  get location(): string {
    return this.filePath;
  }

  async readRecords(columns: readonly string[]): Promise<Array<Record<string, string>>> {
    if (this.delimiter.length !== 1) {
      throw new SourceReadFailedError(this.filePath, `delimiter must be a single character, got "${this.delimiter}"`);
    }

    const content = await this.readContent();
    const lines = this.parseLines(content);

    if (!this.header) {
      return lines.map((fields, i) => this.toRecord(columns, columns.map((_, idx) => idx), fields, i + 1));
    }

    if (lines.length === 0) {
      throw new SourceReadFailedError(this.filePath, 'file is empty, expected a header line');
    }

    const [headerFields, ...dataLines] = lines;
    const positions = columns.map((column) => headerFields.indexOf(column));
    const missing = columns.filter((_, idx) => positions[idx] === -1);
    if (missing.length > 0) {
      throw new SourceReadFailedError(
        this.filePath,
        `header is missing column(s) ${missing.join(', ')} (found: ${headerFields.join(', ')})`
      );
    }

    return dataLines.map((fields, i) => this.toRecord(columns, positions, fields, i + 2));
  }

  private async readContent(): Promise<string> {
    try {
      return await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceReadFailedError(this.filePath, detail, err);
    }
  }

  private parseLines(content: string): string[][] {
    try {
      const parsed: unknown = parse(content, {
        delimiter: this.delimiter,
        bom: true,
        trim: true,
        skip_empty_lines: true,
      });
      return ParsedLinesSchema.parse(parsed);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceReadFailedError(this.filePath, detail, err);
    }
  }

  private toRecord(
    columns: readonly string[],
    positions: readonly number[],
    fields: readonly string[],
    lineNumber: number
  ): Record<string, string> {
    if (!this.header && fields.length !== columns.length) {
      throw new SourceReadFailedError(
        this.filePath,
        `line ${lineNumber} has ${fields.length} fields, expected ${columns.length}`
      );
    }

    const record: Record<string, string> = {};
    columns.forEach((column, idx) => {
      record[column] = fields[positions[idx]];
    });
    return record;
  }
}

export const createDelimitedFileSource = (config: SourceConfig): SourceDialect => new DelimitedFileSource(config);

// Register the dialect
registerSource('delimited-file', createDelimitedFileSource);
