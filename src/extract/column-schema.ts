import { EMPTY_FIELD, parseDate } from './date.js';

export type RawCell = string | null;
export type RawTable = RawCell[][];

export type FieldTransform = 'text' | 'date' | 'int';

export interface FieldSpec {
  name: string;
  transform: FieldTransform;
}

/**
 * Declarative description of one table layout. A table is accepted only when its
 * header row contains every marker; rows are padded to `columnCount` before the
 * positional field mapping is applied. Column 0 is always the row identifier.
 */
export interface ColumnSchema {
  id: string;
  headerMarkers: readonly string[];
  columnCount: number;
  fields: readonly FieldSpec[];
}

export type PdfRecordValue = string | number;
export type PdfRecord = Record<string, PdfRecordValue>;

function text(name: string): FieldSpec {
  return { name, transform: 'text' };
}

function date(name: string): FieldSpec {
  return { name, transform: 'date' };
}

export const KDN_INDIVIDUAL_SCHEMA: ColumnSchema = {
  id: 'kdn_individual',
  headerMarkers: ['(1)', '(3)', '(13)'],
  columnCount: 13,
  fields: [
    { name: 'ID', transform: 'int' },
    text('REFERENCE_NUMBER'),
    text('NAME'),
    text('SALUTATION'),
    text('OCCUPATION'),
    date('DATE_OF_BIRTH'),
    text('BIRTH_PLACE'),
    text('OTHER_NAME'),
    text('NATIONALITY'),
    text('PASSPORT_NUMBER'),
    text('ID_NUMBER'),
    text('ADDRESS'),
    date('LISTED_DATE'),
  ],
};

export const KDN_GROUP_SCHEMA: ColumnSchema = {
  id: 'kdn_group',
  headerMarkers: ['(1)', '(4)', '(7)'],
  columnCount: 7,
  fields: [
    { name: 'ID', transform: 'int' },
    text('REFERENCE_NUMBER'),
    text('NAME'),
    text('ALIAS'),
    text('OTHER_NAME'),
    text('ADDRESS'),
    date('LISTED_DATE'),
  ],
};

export function cleanCell(cell: RawCell): string {
  if (!cell) {
    return '';
  }
  return cell.replace(/\n/g, ' ').trim();
}

/** Row identifier: digits left after removing "."; anything else is not a data row. */
export function parseRowId(cell: string): number | null {
  const digits = cell.replace(/\./g, '');
  if (!/^\d+$/.test(digits)) {
    return null;
  }
  const value = Number.parseInt(digits, 10);
  return value > 0 ? value : null;
}

export function headerMatches(schema: ColumnSchema, header: readonly RawCell[]): boolean {
  const joined = header.map((cell) => cell ?? '').join(' ').toLowerCase();
  return schema.headerMarkers.every((marker) => joined.includes(marker.toLowerCase()));
}

export function padRow(cells: string[], columnCount: number): string[] {
  if (cells.length >= columnCount) {
    return cells;
  }
  return [...cells, ...Array<string>(columnCount - cells.length).fill('')];
}

/**
 * Maps an already-cleaned, padded row to a record. Returns null for non-data rows.
 */
export function mapRow(schema: ColumnSchema, cells: string[], now: Date): PdfRecord | null {
  const id = parseRowId(cells[0] ?? '');
  if (id === null) {
    return null;
  }

  const padded = padRow(cells, schema.columnCount);
  const record: PdfRecord = {};

  schema.fields.forEach((field, index) => {
    const value = padded[index] ?? '';
    switch (field.transform) {
      case 'int':
        record[field.name] = index === 0 ? id : parseRowId(value) ?? EMPTY_FIELD;
        break;
      case 'date':
        record[field.name] = parseDate(value, now);
        break;
      case 'text':
        record[field.name] = value.length > 0 ? value : EMPTY_FIELD;
        break;
    }
  });

  return record;
}
