/**
 * Field coercion by semantic type
 *
 * Raw DAT cells are strings; zod schemas turn them into the typed values the
 * row descriptors promise.
 */

import { z } from 'zod';
import type { FieldSpec, FieldValue, SemanticType } from './types.js';

const integerText = z
  .string()
  .regex(/^[+-]?\d+$/, 'expected an integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'integer out of range');

// TMC tables write coordinates as fixed-width signed integers (+01871379);
// projected exports use decimals with either separator.
const decimalText = z
  .string()
  .regex(/^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/, 'expected a decimal number')
  .transform((value) => Number(value.replace(',', '.')))
  .refine(Number.isFinite, 'decimal out of range');

const flagText = z
  .enum(['0', '1'], { errorMap: () => ({ message: 'expected 0 or 1' }) })
  .transform((value) => (value === '1' ? 1 : 0));

const textValue = z.string();

const CELL_SCHEMAS: Record<SemanticType, z.ZodType<string | number, z.ZodTypeDef, string>> = {
  identifier: integerText,
  reference: integerText,
  integer: integerText,
  flag: flagText,
  coordinate: decimalText,
  code: textValue,
  text: textValue,
};

export type CoercionResult =
  | { readonly ok: true; readonly value: FieldValue }
  | { readonly ok: false; readonly reason: string };

/**
 * Coerce one raw cell. Missing and blank cells become null for optional
 * fields.
 */
export function coerceField(field: FieldSpec, raw: string | undefined): CoercionResult {
  const trimmed = raw?.trim() ?? '';

  if (trimmed === '') {
    return field.required
      ? { ok: false, reason: 'required value is missing' }
      : { ok: true, value: null };
  }

  const result = CELL_SCHEMAS[field.type].safeParse(trimmed);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, reason: `${issue?.message ?? 'invalid value'} (got '${trimmed}')` };
  }
  return { ok: true, value: result.data };
}
