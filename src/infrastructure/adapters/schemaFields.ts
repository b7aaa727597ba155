/**
 * Shared Zod field builders for raw JSON records.
 *
 * Raw datasets omit optional attributes in two ways — the key is missing,
 * or it is present with `null`. Both normalize to `null` here so domain
 * records never carry `undefined`.
 */
import { z } from 'zod/v4';

import { StructuralError } from '@shared/errors/AppError';
import type { SourceRecord } from '@shared/types';

export const nullableText = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

export const nullableNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? null);

/** Whole numbers only; these land in INT64 columns. */
export const nullableInteger = z
  .number()
  .int()
  .nullish()
  .transform((v) => v ?? null);

export const requiredId = z.string().trim().min(1, 'must be a non-empty string');

/**
 * Parse `raw.value` with `schema`, or throw a StructuralError naming the
 * failing fields and the file/offset they came from.
 */
export function parseOrThrow<T extends z.ZodType>(
  schema: T,
  raw: SourceRecord,
  kind: string,
): z.output<T> {
  const result = schema.safeParse(raw.value);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new StructuralError(`Invalid ${kind} record: ${messages}`, `${raw.file}#${raw.offset}`);
  }
  return result.data;
}
