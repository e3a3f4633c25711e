import { parseStringPromise } from 'xml2js';

import { DocumentFormatError, errorMessage } from '../errors.js';

export const ATTRIBUTE_KEY = '$';
export const TEXT_KEY = '#text';

/**
 * Parsed XML as a closed set of shapes. Repeated siblings arrive as a `list`; a
 * single occurrence arrives as the node itself.
 */
export type XmlNode =
  | { kind: 'text'; value: string }
  | { kind: 'element'; attributes: Record<string, string>; text: string | null; children: Record<string, XmlNode> }
  | { kind: 'list'; items: XmlNode[] };

export interface XmlDocument {
  rootName: string;
  root: XmlNode;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }
  const attributes: Record<string, string> = {};
  for (const [name, attribute] of Object.entries(value)) {
    attributes[name] = String(attribute);
  }
  return attributes;
}

export function toXmlNode(value: unknown): XmlNode {
  if (Array.isArray(value)) {
    return { kind: 'list', items: value.map(toXmlNode) };
  }

  if (isRecord(value)) {
    const children: Record<string, XmlNode> = {};
    for (const [key, child] of Object.entries(value)) {
      if (key !== ATTRIBUTE_KEY && key !== TEXT_KEY) {
        children[key] = toXmlNode(child);
      }
    }
    const text = value[TEXT_KEY];
    return {
      kind: 'element',
      attributes: toAttributes(value[ATTRIBUTE_KEY]),
      text: typeof text === 'string' ? text : null,
      children,
    };
  }

  if (value === null || value === undefined) {
    return { kind: 'text', value: '' };
  }

  return { kind: 'text', value: String(value) };
}

/**
 * Parses an XML document. Malformed input or a document without a single root
 * element raises DocumentFormatError.
 */
export async function parseXmlDocument(content: Uint8Array | string): Promise<XmlDocument> {
  const xml = typeof content === 'string' ? content : Buffer.from(content).toString('utf8');

  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml, {
      explicitArray: false,
      explicitRoot: true,
      attrkey: ATTRIBUTE_KEY,
      charkey: TEXT_KEY,
      trim: true,
    });
  } catch (error) {
    throw new DocumentFormatError(`malformed XML: ${errorMessage(error)}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new DocumentFormatError('XML document has no root element');
  }

  const entries = Object.entries(parsed);
  if (entries.length !== 1) {
    throw new DocumentFormatError('XML document has no root element');
  }

  const [rootName, root] = entries[0];
  return { rootName, root: toXmlNode(root) };
}

/** Cardinality normalization: absent becomes [], a single node becomes [node]. */
export function asList(node: XmlNode | undefined): XmlNode[] {
  if (!node) {
    return [];
  }
  return node.kind === 'list' ? node.items : [node];
}

export function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  if (!node) {
    return undefined;
  }
  if (node.kind === 'element') {
    return node.children[name];
  }
  if (node.kind === 'list') {
    return child(node.items[0], name);
  }
  return undefined;
}

/** Text content of a leaf or of an element's own text; '' when there is none. */
export function textOf(node: XmlNode | undefined): string {
  if (!node) {
    return '';
  }
  switch (node.kind) {
    case 'text':
      return node.value.trim();
    case 'element':
      return (node.text ?? '').trim();
    case 'list':
      return textOf(node.items[0]);
  }
}

/**
 * Integer for numeric text, or numeric text held one level down under the text
 * key of an attributed element; '' otherwise.
 */
export function safeInt(node: XmlNode | undefined): number | '' {
  if (!node) {
    return '';
  }
  let raw: string | null = null;
  if (node.kind === 'text') {
    raw = node.value;
  } else if (node.kind === 'element') {
    raw = node.text;
  }
  if (raw === null || !/^\d+$/.test(raw)) {
    return '';
  }
  return Number.parseInt(raw, 10);
}
