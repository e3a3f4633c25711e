import { describe, expect, it } from 'vitest';

import {
  KDN_GROUP_SCHEMA,
  KDN_INDIVIDUAL_SCHEMA,
  type RawTable,
  cleanCell,
  headerMatches,
  mapRow,
  padRow,
  parseRowId,
} from '../../src/extract/column-schema.js';
import { type PdfPageContent, extractRecords } from '../../src/extract/pdf-records.js';

const NOW = new Date(2024, 5, 1);

function markers(count: number): string[] {
  return Array.from({ length: count }, (_value, index) => `Column\n(${index + 1})`);
}

const INDIVIDUAL_HEADER = markers(13);
const GROUP_HEADER = markers(7);

const individualsTable: RawTable = [
  INDIVIDUAL_HEADER,
  [
    '1.',
    'KDN.I.01',
    'Test Person\nOne',
    'Encik',
    null,
    '3.7.1995',
    'Sample City',
    '-',
    'Examplestan',
    'A0000001',
    '800101-01-0001',
    'No. 1, Test Road',
    '1.2.2020',
  ],
  ['Note:', 'continued from previous page'],
  ['2', 'KDN.I.02', 'Second Person'],
];

describe('column schema helpers', () => {
  it('cleans newlines and surrounding whitespace', () => {
    expect(cleanCell(' Test\nPerson ')).toBe('Test Person');
    expect(cleanCell(null)).toBe('');
  });

  it('parses row identifiers after removing dots', () => {
    expect(parseRowId('12.')).toBe(12);
    expect(parseRowId('1.0')).toBe(10);
    expect(parseRowId('Note:')).toBeNull();
    expect(parseRowId('')).toBeNull();
    expect(parseRowId('0')).toBeNull();
  });

  it('requires every header marker', () => {
    expect(headerMatches(KDN_INDIVIDUAL_SCHEMA, INDIVIDUAL_HEADER)).toBe(true);
    expect(headerMatches(KDN_INDIVIDUAL_SCHEMA, GROUP_HEADER)).toBe(false);
    expect(headerMatches(KDN_GROUP_SCHEMA, GROUP_HEADER)).toBe(true);
    expect(headerMatches(KDN_GROUP_SCHEMA, [null, '(1)', '(4)'])).toBe(false);
  });

  it('pads short rows to the column count', () => {
    expect(padRow(['1', 'a'], 4)).toEqual(['1', 'a', '', '']);
    expect(padRow(['1', 'a', 'b'], 2)).toEqual(['1', 'a', 'b']);
  });

  it('drops rows whose first column is not an identifier', () => {
    expect(mapRow(KDN_GROUP_SCHEMA, ['Note:', '', '', '', '', '', ''], NOW)).toBeNull();
    expect(mapRow(KDN_GROUP_SCHEMA, [], NOW)).toBeNull();
  });
});

describe('extractRecords', () => {
  it('maps matching table rows to records in column order', () => {
    const pages: PdfPageContent[] = [{ index: 0, text: 'A. INDIVIDU', tables: [individualsTable] }];

    const records = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW });

    expect(records).toEqual([
      {
        ID: 1,
        REFERENCE_NUMBER: 'KDN.I.01',
        NAME: 'Test Person One',
        SALUTATION: 'Encik',
        OCCUPATION: '-',
        DATE_OF_BIRTH: '3 July 1995',
        BIRTH_PLACE: 'Sample City',
        OTHER_NAME: '-',
        NATIONALITY: 'Examplestan',
        PASSPORT_NUMBER: 'A0000001',
        ID_NUMBER: '800101-01-0001',
        ADDRESS: 'No. 1, Test Road',
        LISTED_DATE: '1 February 2020',
      },
      {
        ID: 2,
        REFERENCE_NUMBER: 'KDN.I.02',
        NAME: 'Second Person',
        SALUTATION: '-',
        OCCUPATION: '-',
        DATE_OF_BIRTH: '-',
        BIRTH_PLACE: '-',
        OTHER_NAME: '-',
        NATIONALITY: '-',
        PASSPORT_NUMBER: '-',
        ID_NUMBER: '-',
        ADDRESS: '-',
        LISTED_DATE: '-',
      },
    ]);
  });

  it('keeps field order stable', () => {
    const pages: PdfPageContent[] = [{ index: 0, text: '', tables: [individualsTable] }];
    const [first] = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW });

    expect(Object.keys(first)).toEqual(KDN_INDIVIDUAL_SCHEMA.fields.map((field) => field.name));
  });

  it('skips header-only tables and tables with the wrong header', () => {
    const pages: PdfPageContent[] = [
      {
        index: 0,
        text: null,
        tables: [[INDIVIDUAL_HEADER], [GROUP_HEADER, ['1', 'KDN.G.01', 'Test Group']], []],
      },
    ];

    expect(extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW })).toEqual([]);
  });

  it('stops at the section heading before reading that page', () => {
    const pages: PdfPageContent[] = [
      { index: 0, text: 'A. INDIVIDU', tables: [individualsTable] },
      {
        index: 1,
        text: 'Senarai\nB. GROUP',
        tables: [[INDIVIDUAL_HEADER, ['3', 'KDN.I.03', 'Not An Individual']]],
      },
      { index: 2, text: undefined, tables: [[INDIVIDUAL_HEADER, ['4', 'KDN.I.04', 'Also Skipped']]] },
    ];

    const records = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW, stopAtHeading: 'B. GROUP' });

    expect(records.map((record) => record.ID)).toEqual([1, 2]);
  });

  it('treats missing page text as carrying no heading', () => {
    const pages: PdfPageContent[] = [
      { index: 0, text: undefined, tables: [individualsTable] },
      { index: 1, text: null, tables: [[INDIVIDUAL_HEADER, ['3', 'KDN.I.03', 'Third Person']]] },
    ];

    const records = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW, stopAtHeading: 'B. GROUP' });

    expect(records.map((record) => record.ID)).toEqual([1, 2, 3]);
  });

  it('reads only pages inside the page range', () => {
    const groupTable = (id: string): RawTable => [GROUP_HEADER, [id, `KDN.G.0${id}`, `Group ${id}`]];
    const pages: PdfPageContent[] = [
      { index: 10, text: '', tables: [groupTable('1')] },
      { index: 11, text: 'B. GROUP', tables: [groupTable('2')] },
      { index: 13, text: '', tables: [groupTable('3')] },
      { index: 14, text: '', tables: [groupTable('4')] },
    ];

    const records = extractRecords(pages, KDN_GROUP_SCHEMA, { now: NOW, pageRange: { start: 11, end: 13 } });

    expect(records).toEqual([
      {
        ID: 2,
        REFERENCE_NUMBER: 'KDN.G.02',
        NAME: 'Group 2',
        ALIAS: '-',
        OTHER_NAME: '-',
        ADDRESS: '-',
        LISTED_DATE: '-',
      },
      {
        ID: 3,
        REFERENCE_NUMBER: 'KDN.G.03',
        NAME: 'Group 3',
        ALIAS: '-',
        OTHER_NAME: '-',
        ADDRESS: '-',
        LISTED_DATE: '-',
      },
    ]);
  });

  it('returns nothing for pages without tables', () => {
    const pages: PdfPageContent[] = [{ index: 0, text: 'cover page', tables: [] }];

    expect(extractRecords(pages, KDN_GROUP_SCHEMA, { now: NOW })).toEqual([]);
  });

  it('yields identical output for identical input', () => {
    const pages: PdfPageContent[] = [{ index: 0, text: '', tables: [individualsTable] }];

    const first = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW });
    const second = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, { now: NOW });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});
