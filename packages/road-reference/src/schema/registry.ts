/**
 * Schema Registry
 *
 * Declares the column layout of every DAT file category of a TMC location
 * table export. Lookups are pure; no I/O happens here.
 *
 * Columns are matched by header name, so the declared order is only the
 * canonical order used in documentation and fixtures.
 */

import { basename } from 'node:path';
import { SchemaError } from '../core/errors.js';
import type {
  FieldSpec,
  FieldValue,
  FileSchema,
  RowOf,
  SemanticType,
} from './types.js';

// ============================================================================
// Field Helpers
// ============================================================================

function req<N extends string, T extends SemanticType>(name: N, type: T): FieldSpec<N, T, true> {
  return { name, type, required: true };
}

function opt<N extends string, T extends SemanticType>(name: N, type: T): FieldSpec<N, T, false> {
  return { name, type, required: false };
}

function defineSchema<C extends string, F extends readonly FieldSpec[]>(
  category: C,
  fields: F,
  key: readonly F[number]['name'][]
): FileSchema<C, F> {
  return {
    category,
    fileName: `${category}.DAT`,
    delimiter: ';',
    encoding: 'utf-8',
    fields,
    key,
  };
}

/** Columns shared by every located entity (areas, roads, segments, points) */
const LOCATION_FIELDS = [
  req('cid', 'reference'),
  req('tabcd', 'reference'),
  req('lcd', 'identifier'),
  req('class', 'code'),
  req('tcd', 'integer'),
  req('stcd', 'integer'),
] as const;

const AREA_FIELDS = [
  ...LOCATION_FIELDS,
  opt('nid', 'reference'),
  opt('pol_lcd', 'reference'),
] as const;

const OFFSET_FIELDS = [
  req('cid', 'reference'),
  req('tabcd', 'reference'),
  req('lcd', 'reference'),
  opt('neg_off_lcd', 'reference'),
  opt('pos_off_lcd', 'reference'),
] as const;

// ============================================================================
// Declarations
// ============================================================================

export const SCHEMAS = {
  COUNTRIES: defineSchema(
    'COUNTRIES',
    [req('cid', 'identifier'), opt('ecc', 'code'), opt('ccd', 'code'), req('cname', 'text')] as const,
    ['cid']
  ),
  LOCATIONDATASETS: defineSchema(
    'LOCATIONDATASETS',
    [
      req('cid', 'reference'),
      req('tabcd', 'identifier'),
      opt('dcomment', 'text'),
      opt('version', 'text'),
      opt('versiondescription', 'text'),
    ] as const,
    ['cid', 'tabcd']
  ),
  LOCATIONCODES: defineSchema(
    'LOCATIONCODES',
    [
      req('cid', 'reference'),
      req('tabcd', 'reference'),
      req('lcd', 'identifier'),
      opt('allocated', 'flag'),
    ] as const,
    ['cid', 'tabcd', 'lcd']
  ),
  CLASSES: defineSchema(
    'CLASSES',
    [req('class', 'code'), opt('classdesc', 'text')] as const,
    ['class']
  ),
  TYPES: defineSchema(
    'TYPES',
    [
      req('class', 'code'),
      req('tcd', 'integer'),
      opt('tdesc', 'text'),
      opt('tnatcode', 'code'),
      opt('tnatdesc', 'text'),
    ] as const,
    ['class', 'tcd']
  ),
  SUBTYPES: defineSchema(
    'SUBTYPES',
    [
      req('class', 'code'),
      req('tcd', 'integer'),
      req('stcd', 'integer'),
      opt('sdesc', 'text'),
      opt('snatcode', 'code'),
      opt('snatdesc', 'text'),
    ] as const,
    ['class', 'tcd', 'stcd']
  ),
  LANGUAGES: defineSchema(
    'LANGUAGES',
    [req('cid', 'reference'), req('lid', 'identifier'), opt('language', 'text')] as const,
    ['cid', 'lid']
  ),
  NAMES: defineSchema(
    'NAMES',
    [
      req('cid', 'reference'),
      req('lid', 'reference'),
      req('nid', 'identifier'),
      req('name', 'text'),
      opt('ncomment', 'text'),
      opt('officialname', 'text'),
    ] as const,
    ['cid', 'lid', 'nid']
  ),
  NAMETRANSLATIONS: defineSchema(
    'NAMETRANSLATIONS',
    [
      req('cid', 'reference'),
      opt('lid', 'reference'),
      opt('nid', 'reference'),
      opt('translation', 'text'),
    ] as const,
    ['cid', 'lid', 'nid']
  ),
  SUBTYPETRANSLATIONS: defineSchema(
    'SUBTYPETRANSLATIONS',
    [
      req('cid', 'reference'),
      opt('lid', 'reference'),
      opt('class', 'code'),
      opt('tcd', 'integer'),
      opt('stcd', 'integer'),
      opt('stranslation', 'text'),
    ] as const,
    ['cid', 'lid', 'class', 'tcd', 'stcd']
  ),
  EUROROADNO: defineSchema(
    'EUROROADNO',
    [req('cid', 'reference'), opt('erno', 'code'), opt('ernodesc', 'text')] as const,
    ['cid', 'erno']
  ),
  ERNO_BELONGS_TO_CO: defineSchema(
    'ERNO_BELONGS_TO_CO',
    [req('cid', 'reference'), opt('erno', 'code')] as const,
    ['cid', 'erno']
  ),
  ADMINISTRATIVEAREA: defineSchema('ADMINISTRATIVEAREA', AREA_FIELDS, ['lcd']),
  OTHERAREAS: defineSchema('OTHERAREAS', AREA_FIELDS, ['lcd']),
  ROADS: defineSchema(
    'ROADS',
    [
      ...LOCATION_FIELDS,
      opt('roadnumber', 'text'),
      opt('rnid', 'reference'),
      opt('n1id', 'reference'),
      opt('n2id', 'reference'),
      opt('pol_lcd', 'reference'),
      opt('pes_lev', 'code'),
      opt('rdid', 'code'),
    ] as const,
    ['lcd']
  ),
  ROAD_NETWORK_LEVEL_TYPES: defineSchema(
    'ROAD_NETWORK_LEVEL_TYPES',
    [req('cid', 'reference'), opt('tabcd', 'reference'), opt('pes_lev', 'code'), opt('description', 'text')] as const,
    ['cid', 'tabcd', 'pes_lev']
  ),
  SEGMENTS: defineSchema(
    'SEGMENTS',
    [
      ...LOCATION_FIELDS,
      opt('roadnumber', 'text'),
      opt('rnid', 'reference'),
      opt('n1id', 'reference'),
      opt('n2id', 'reference'),
      opt('roa_lcd', 'reference'),
      opt('seg_lcd', 'reference'),
      opt('pol_lcd', 'reference'),
      opt('rdid', 'code'),
    ] as const,
    ['lcd']
  ),
  SEG_HAS_ERNO: defineSchema(
    'SEG_HAS_ERNO',
    [req('cid', 'reference'), opt('tabcd', 'reference'), opt('lcd', 'reference'), opt('erno', 'code')] as const,
    ['cid', 'tabcd', 'lcd', 'erno']
  ),
  ROA_HAS_ERNO: defineSchema(
    'ROA_HAS_ERNO',
    [req('cid', 'reference'), opt('tabcd', 'reference'), opt('lcd', 'reference'), opt('erno', 'code')] as const,
    ['cid', 'tabcd', 'lcd', 'erno']
  ),
  SOFFSETS: defineSchema('SOFFSETS', OFFSET_FIELDS, ['lcd']),
  POINTS: defineSchema(
    'POINTS',
    [
      ...LOCATION_FIELDS,
      opt('junctionnumber', 'text'),
      opt('rnid', 'reference'),
      opt('n1id', 'reference'),
      opt('n2id', 'reference'),
      opt('pol_lcd', 'reference'),
      opt('oth_lcd', 'reference'),
      opt('seg_lcd', 'reference'),
      opt('roa_lcd', 'reference'),
      opt('inpos', 'flag'),
      opt('inneg', 'flag'),
      opt('outpos', 'flag'),
      opt('outneg', 'flag'),
      opt('presentpos', 'flag'),
      opt('presentneg', 'flag'),
      opt('diversionpos', 'text'),
      opt('diversionneg', 'text'),
      req('xcoord', 'coordinate'),
      req('ycoord', 'coordinate'),
      opt('interruptsroad', 'text'),
      opt('urban', 'flag'),
      opt('jnid', 'reference'),
    ] as const,
    ['lcd']
  ),
  POFFSETS: defineSchema('POFFSETS', OFFSET_FIELDS, ['lcd']),
  INTERSECTIONS: defineSchema(
    'INTERSECTIONS',
    [
      req('cid', 'reference'),
      req('tabcd', 'reference'),
      req('lcd', 'reference'),
      req('int_cid', 'reference'),
      req('int_tabcd', 'reference'),
      req('int_lcd', 'reference'),
    ] as const,
    ['lcd', 'int_cid', 'int_tabcd', 'int_lcd']
  ),
} as const;

// ============================================================================
// Lookups
// ============================================================================

export type FileCategory = keyof typeof SCHEMAS;

export type SchemaFor<C extends FileCategory> = (typeof SCHEMAS)[C];

/**
 * Typed row descriptor of a category
 */
export type RowFor<C extends FileCategory> = RowOf<SchemaFor<C>['fields']>;

export const FILE_CATEGORIES = Object.keys(SCHEMAS).filter(isFileCategory);

export function isFileCategory(value: string): value is FileCategory {
  return Object.prototype.hasOwnProperty.call(SCHEMAS, value);
}

/**
 * Normalise a category or file name: `points.dat` and `POINTS` both give
 * `POINTS`.
 */
function normaliseFileType(fileType: string): string {
  return basename(fileType).toUpperCase().replace(/\.DAT$/, '');
}

/**
 * Category of a file name, or null when no schema is declared for it
 */
export function categoryForFile(fileName: string): FileCategory | null {
  const normalised = normaliseFileType(fileName);
  return isFileCategory(normalised) ? normalised : null;
}

export function schemaFor<C extends FileCategory>(category: C): SchemaFor<C> {
  return SCHEMAS[category];
}

/**
 * Ordered field list of a file type
 *
 * @param fileType - Category name or file name, any case
 * @throws SchemaError when no schema is declared for the file type
 */
export function fieldsFor(fileType: string): readonly FieldSpec[] {
  const category = categoryForFile(fileType);
  if (category === null) {
    throw new SchemaError(`Unknown file type: ${fileType}`, normaliseFileType(fileType));
  }
  return SCHEMAS[category].fields;
}

/**
 * Map every declared field to its column index in a header row.
 *
 * Header names are matched case-insensitively; empty header cells (trailing
 * delimiter) and undeclared columns are ignored.
 *
 * @returns Column index per field name; absent optional fields are omitted
 * @throws SchemaError when a required column is missing
 */
export function validateHeader(
  category: FileCategory,
  header: readonly string[],
  file: string = SCHEMAS[category].fileName
): ReadonlyMap<string, number> {
  const positions = new Map<string, number>();
  header.forEach((cell, index) => {
    const name = cell.replace(/^\uFEFF/, '').trim().toLowerCase();
    if (name !== '' && !positions.has(name)) {
      positions.set(name, index);
    }
  });

  const columns = new Map<string, number>();
  const missing: string[] = [];
  for (const field of SCHEMAS[category].fields) {
    const index = positions.get(field.name);
    if (index !== undefined) {
      columns.set(field.name, index);
    } else if (field.required) {
      missing.push(field.name.toUpperCase());
    }
  }

  if (missing.length > 0) {
    throw new SchemaError(
      `${file}: header lacks required column(s) ${missing.join(', ')}`,
      category,
      file
    );
  }

  return columns;
}

/**
 * Check that a record carries every declared field with a value of the
 * declared semantic type.
 */
export function conformsTo<F extends readonly FieldSpec[]>(
  fields: F,
  record: Readonly<Record<string, FieldValue>>
): record is Readonly<Record<string, FieldValue>> & RowOf<F> {
  return fields.every((field) => {
    const value = record[field.name];
    if (value === null || value === undefined) {
      return value === null && !field.required;
    }
    return field.type === 'code' || field.type === 'text'
      ? typeof value === 'string'
      : typeof value === 'number';
  });
}
