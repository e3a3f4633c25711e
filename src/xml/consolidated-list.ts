import { DocumentFormatError } from '../errors.js';
import { type XmlDocument, type XmlNode, asList, child, safeInt, textOf } from './xml-tree.js';

export type StructRecord = Record<string, string>;
export type CanonicalValue = string | number | string[] | StructRecord[];
export type CanonicalRecord = Record<string, CanonicalValue>;

export interface ConsolidatedListSnapshot {
  [documentAttribute: `@${string}`]: string;
  INDIVIDUALS: CanonicalRecord[];
  ENTITIES: CanonicalRecord[];
}

/** `always`: key present with an empty default. `omit`: key dropped when empty. */
type Presence = 'always' | 'omit';

type FieldRule =
  | { name: string; kind: 'text' | 'int' | 'values'; presence: Presence }
  | { name: string; kind: 'struct'; presence: Presence; fields: readonly SubField[] }
  | { name: string; kind: 'documents'; presence: Presence; from: string; documentType: RegExp };

interface SubField {
  name: string;
  presence: Presence;
}

export const ROOT_ELEMENT = 'CONSOLIDATED_LIST';
export const DOCUMENT_ATTRIBUTES = ['xmlns:xsi', 'xsi:noNamespaceSchemaLocation', 'dateGenerated'] as const;
export const DOCUMENT_ATTRIBUTE_PREFIX = '@';

const always = (name: string): SubField => ({ name, presence: 'always' });
const omit = (name: string): SubField => ({ name, presence: 'omit' });

const ALIAS_FIELDS = [
  always('QUALITY'),
  always('ALIAS_NAME'),
  omit('DATE_OF_BIRTH'),
  omit('CITY_OF_BIRTH'),
  omit('COUNTRY_OF_BIRTH'),
  omit('NOTE'),
] as const;

const ADDRESS_FIELDS = [
  omit('STREET'),
  omit('CITY'),
  omit('STATE_PROVINCE'),
  omit('ZIP_CODE'),
  omit('COUNTRY'),
  omit('NOTE'),
] as const;

const DATE_OF_BIRTH_FIELDS = [
  always('TYPE_OF_DATE'),
  omit('DATE'),
  omit('YEAR'),
  omit('FROM_YEAR'),
  omit('TO_YEAR'),
  omit('NOTE'),
] as const;

const PLACE_OF_BIRTH_FIELDS = [omit('CITY'), omit('STATE_PROVINCE'), omit('COUNTRY'), omit('NOTE')] as const;

const DOCUMENT_FIELDS = [
  always('TYPE_OF_DOCUMENT'),
  omit('TYPE_OF_DOCUMENT2'),
  always('NUMBER'),
  omit('ISSUING_COUNTRY'),
  omit('DATE_OF_ISSUE'),
  omit('CITY_OF_ISSUE'),
  omit('COUNTRY_OF_ISSUE'),
  omit('NOTE'),
] as const;

/**
 * Individual output contract. Order here is the key order of the JSON output.
 */
export const INDIVIDUAL_FIELDS: readonly FieldRule[] = [
  { name: 'DATAID', kind: 'int', presence: 'always' },
  { name: 'VERSIONNUM', kind: 'int', presence: 'always' },
  { name: 'FIRST_NAME', kind: 'text', presence: 'always' },
  { name: 'SECOND_NAME', kind: 'text', presence: 'always' },
  { name: 'THIRD_NAME', kind: 'text', presence: 'always' },
  { name: 'FOURTH_NAME', kind: 'text', presence: 'always' },
  { name: 'UN_LIST_TYPE', kind: 'text', presence: 'always' },
  { name: 'REFERENCE_NUMBER', kind: 'text', presence: 'always' },
  { name: 'LISTED_ON', kind: 'text', presence: 'always' },
  { name: 'NAME_ORIGINAL_SCRIPT', kind: 'text', presence: 'always' },
  { name: 'COMMENTS1', kind: 'text', presence: 'always' },
  { name: 'SUBMITTED_BY', kind: 'text', presence: 'always' },
  { name: 'TITLE', kind: 'values', presence: 'omit' },
  { name: 'DESIGNATION', kind: 'values', presence: 'always' },
  { name: 'NATIONALITY', kind: 'values', presence: 'always' },
  { name: 'LIST_TYPE', kind: 'values', presence: 'omit' },
  { name: 'LAST_DAY_UPDATED', kind: 'values', presence: 'omit' },
  { name: 'INDIVIDUAL_ALIAS', kind: 'struct', presence: 'always', fields: ALIAS_FIELDS },
  { name: 'INDIVIDUAL_ADDRESS', kind: 'struct', presence: 'always', fields: ADDRESS_FIELDS },
  { name: 'INDIVIDUAL_DATE_OF_BIRTH', kind: 'struct', presence: 'always', fields: DATE_OF_BIRTH_FIELDS },
  { name: 'INDIVIDUAL_PLACE_OF_BIRTH', kind: 'struct', presence: 'always', fields: PLACE_OF_BIRTH_FIELDS },
  { name: 'INDIVIDUAL_DOCUMENT', kind: 'struct', presence: 'always', fields: DOCUMENT_FIELDS },
  {
    name: 'NATIONAL_ID',
    kind: 'documents',
    presence: 'always',
    from: 'INDIVIDUAL_DOCUMENT',
    documentType: /national identification/i,
  },
  { name: 'PASSPORT', kind: 'documents', presence: 'always', from: 'INDIVIDUAL_DOCUMENT', documentType: /passport/i },
  { name: 'GENDER', kind: 'text', presence: 'always' },
  { name: 'SORT_KEY', kind: 'text', presence: 'omit' },
  { name: 'SORT_KEY_LAST_MOD', kind: 'text', presence: 'omit' },
  { name: 'DELISTED_ON', kind: 'text', presence: 'omit' },
  { name: 'OTHER_INFORMATION', kind: 'text', presence: 'always' },
];

export const ENTITY_FIELDS: readonly FieldRule[] = [
  { name: 'DATAID', kind: 'int', presence: 'always' },
  { name: 'VERSIONNUM', kind: 'int', presence: 'always' },
  { name: 'FIRST_NAME', kind: 'text', presence: 'always' },
  { name: 'UN_LIST_TYPE', kind: 'text', presence: 'always' },
  { name: 'REFERENCE_NUMBER', kind: 'text', presence: 'always' },
  { name: 'LISTED_ON', kind: 'text', presence: 'always' },
  { name: 'NAME_ORIGINAL_SCRIPT', kind: 'text', presence: 'always' },
  { name: 'COMMENTS1', kind: 'text', presence: 'always' },
  { name: 'SUBMITTED_BY', kind: 'text', presence: 'always' },
  { name: 'LIST_TYPE', kind: 'values', presence: 'omit' },
  { name: 'LAST_DAY_UPDATED', kind: 'values', presence: 'omit' },
  { name: 'ENTITY_ALIAS', kind: 'struct', presence: 'always', fields: ALIAS_FIELDS },
  { name: 'ENTITY_ADDRESS', kind: 'struct', presence: 'always', fields: ADDRESS_FIELDS },
  { name: 'SORT_KEY', kind: 'text', presence: 'omit' },
  { name: 'SORT_KEY_LAST_MOD', kind: 'text', presence: 'omit' },
  { name: 'DELISTED_ON', kind: 'text', presence: 'omit' },
  { name: 'OTHER_INFORMATION', kind: 'text', presence: 'always' },
];

/** `<NATIONALITY><VALUE>a</VALUE><VALUE>b</VALUE></NATIONALITY>` and repeated wrappers alike. */
function collectValues(node: XmlNode | undefined): string[] {
  const values: string[] = [];
  for (const wrapper of asList(node)) {
    const inner = child(wrapper, 'VALUE');
    const items = inner === undefined ? [wrapper] : asList(inner);
    for (const item of items) {
      const value = textOf(item);
      if (value.length > 0) {
        values.push(value);
      }
    }
  }
  return values;
}

function toStruct(node: XmlNode, fields: readonly SubField[]): StructRecord | null {
  const struct: StructRecord = {};
  let hasContent = false;

  for (const field of fields) {
    const value = textOf(child(node, field.name));
    if (value.length > 0) {
      hasContent = true;
    }
    if (value.length > 0 || field.presence === 'always') {
      struct[field.name] = value;
    }
  }

  return hasContent ? struct : null;
}

function collectStructs(node: XmlNode | undefined, fields: readonly SubField[]): StructRecord[] {
  return asList(node)
    .map((item) => toStruct(item, fields))
    .filter((item): item is StructRecord => item !== null);
}

function isEmpty(value: CanonicalValue): boolean {
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return value === '';
}

export function normalizeRecord(node: XmlNode, rules: readonly FieldRule[]): CanonicalRecord {
  const record: CanonicalRecord = {};

  for (const rule of rules) {
    let value: CanonicalValue;
    switch (rule.kind) {
      case 'int':
        value = safeInt(child(node, rule.name));
        break;
      case 'text':
        value = textOf(child(node, rule.name));
        break;
      case 'values':
        value = collectValues(child(node, rule.name));
        break;
      case 'struct':
        value = collectStructs(child(node, rule.name), rule.fields);
        break;
      case 'documents': {
        // an element of the field's own name wins over the documents derived from `from`
        const own = child(node, rule.name);
        value =
          own !== undefined
            ? collectStructs(own, DOCUMENT_FIELDS)
            : collectStructs(child(node, rule.from), DOCUMENT_FIELDS).filter((document) =>
                rule.documentType.test(document.TYPE_OF_DOCUMENT ?? ''),
              );
        break;
      }
    }

    if (rule.presence === 'always' || !isEmpty(value)) {
      record[rule.name] = value;
    }
  }

  return record;
}

/**
 * Maps the UN consolidated list into the published snapshot: document attributes
 * lifted to `@`-prefixed top-level keys, then INDIVIDUALS and ENTITIES.
 */
export function normalizeConsolidatedList(document: XmlDocument): ConsolidatedListSnapshot {
  if (document.rootName !== ROOT_ELEMENT || document.root.kind !== 'element') {
    throw new DocumentFormatError(`unexpected XML root element: ${document.rootName}`);
  }

  const root = document.root;
  const attributes: Record<`@${string}`, string> = {};

  for (const attribute of DOCUMENT_ATTRIBUTES) {
    const value = root.attributes[attribute];
    if (value !== undefined) {
      attributes[`${DOCUMENT_ATTRIBUTE_PREFIX}${attribute}`] = value;
    }
  }

  return {
    ...attributes,
    INDIVIDUALS: asList(child(root, 'INDIVIDUALS'))
      .flatMap((section) => asList(child(section, 'INDIVIDUAL')))
      .map((individual) => normalizeRecord(individual, INDIVIDUAL_FIELDS)),
    ENTITIES: asList(child(root, 'ENTITIES'))
      .flatMap((section) => asList(child(section, 'ENTITY')))
      .map((entity) => normalizeRecord(entity, ENTITY_FIELDS)),
  };
}
