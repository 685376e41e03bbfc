/**
 * Schema Type Definitions
 *
 * A file schema declares the columns of one DAT file category. Row types are
 * derived from the declaration, so every category gets a typed row descriptor
 * instead of string-keyed lookups.
 */

/**
 * Semantic type of a column
 *
 * - identifier: integer primary key (location code, name id, ...)
 * - reference: integer foreign key into another category
 * - code: enumeration code kept as text (location class, country code)
 * - integer: plain integer (type and subtype codes, levels)
 * - flag: 0/1
 * - coordinate: decimal, '.' or ',' separator, optional sign
 * - text: free text, trimmed
 */
export type SemanticType =
  | 'identifier'
  | 'reference'
  | 'code'
  | 'integer'
  | 'flag'
  | 'coordinate'
  | 'text';

export type FieldValue = string | number | null;

export interface FieldSpec<
  N extends string = string,
  T extends SemanticType = SemanticType,
  R extends boolean = boolean,
> {
  readonly name: N;
  readonly type: T;
  readonly required: R;
}

/**
 * Text encodings a location table can be declared in
 */
export const DAT_ENCODINGS = ['utf-8', 'windows-1250', 'iso-8859-2'] as const;

export type DatEncoding = (typeof DAT_ENCODINGS)[number];

export interface FileSchema<
  C extends string = string,
  F extends readonly FieldSpec[] = readonly FieldSpec[],
> {
  readonly category: C;
  readonly fileName: `${C}.DAT`;
  readonly delimiter: ';';
  readonly encoding: DatEncoding;
  readonly fields: F;
  /** Fields that identify a row within the file */
  readonly key: readonly F[number]['name'][];
}

type ValueOf<T extends SemanticType> = T extends 'code' | 'text' ? string : number;

/**
 * Row type of a field list: required fields are non-null
 */
export type RowOf<F extends readonly FieldSpec[]> = {
  readonly [K in F[number] as K['name']]: K['required'] extends true
    ? ValueOf<K['type']>
    : ValueOf<K['type']> | null;
};
