/**
 * Food record parsing
 *
 * Shared by the catalog loader (one tab-separated line per record) and the
 * entry form (one text box per field). Both hand over plain strings; the
 * zod schema turns them into a FoodRecord or a list of reasons.
 */

import { z } from 'zod';
import type { FoodRecord, ParseResult } from '../shared/types.js';

/** Plain decimal real: `12`, `0.5`, `.5`, `3.`, `1e3`, with optional sign. */
const REAL_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const amount = z
  .string()
  .regex(REAL_NUMBER, 'not a number')
  .transform((text) => Number(text))
  .pipe(z.number().finite('not finite').nonnegative('negative'));

export const FoodRecordSchema = z.object({
  name: z.string(),
  calories: amount,
  carbs: amount,
  fat: amount,
  protein: amount,
  unit: z.string(),
});

/** Raw text for each record field, before validation. */
export type FoodRecordFields = z.input<typeof FoodRecordSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseFoodRecord(fields: FoodRecordFields): ParseResult<FoodRecord> {
  const result = FoodRecordSchema.safeParse(fields);
  if (!result.success) {
    return { success: false, error: describeIssues(result.error) };
  }
  return { success: true, value: result.data };
}

export function parseQuantity(text: string): ParseResult<number> {
  const result = amount.safeParse(text);
  if (!result.success) {
    return { success: false, error: `quantity: ${describeIssues(result.error)}` };
  }
  return { success: true, value: result.data };
}

/**
 * Render a record as a catalog line. `String(n)` keeps enough digits for
 * `Number` to read back the same value.
 */
export function formatFoodRecord(record: FoodRecord): string {
  return [
    record.name,
    String(record.calories),
    String(record.carbs),
    String(record.fat),
    String(record.protein),
    record.unit,
  ].join('\t');
}
