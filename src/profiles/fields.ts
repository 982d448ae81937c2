import { z } from 'zod';
import type { ParseResult } from '../engine/types';

// Delimited files yield strings and PostgreSQL returns bigint/numeric aggregates as strings,
// so numeric columns accept either form.
const numericInput = z.union([z.number(), z.string().trim().min(1).transform(Number)]);

export const numericField = numericInput.pipe(z.number().finite());

export const integerField = numericInput.pipe(z.number().int());

export const textField = z.string();

export type RowParser<T> = (raw: Record<string, unknown>) => ParseResult<T>;

/**
 * Wrap a zod object schema as a row parser that reports every failing field.
 */
export const zodRowParser =
  <S extends z.ZodTypeAny>(schema: S): RowParser<z.output<S>> =>
  (raw) => {
    const result = schema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
        .join('; ');
      return { ok: false, reason };
    }
    return { ok: true, record: result.data };
  };
