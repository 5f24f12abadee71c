/**
 * XML tree normalizer
 *
 * Parses well-formed XML into the shared Value tree:
 * - each element becomes an entry keyed by its tag name
 * - attributes go under the reserved `@attributes` key
 * - a tag repeated among siblings becomes an ordered `many` entry
 * - a childless element is its trimmed text, or an empty mapping without text
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../errors.js';
import {
  type MappingValue,
  type Repeated,
  type Value,
  appendRepeated,
  mapping,
  one,
  primitive,
} from '../../model/Value.js';

export const ATTRIBUTES_KEY = '@attributes';

const TEXT_NODE_NAME = '#text';
const ATTRIBUTE_GROUP = ':@';

export interface XMLNormalizeOptions {
  /** Drop namespace prefixes from element and attribute names */
  stripNamespaces?: boolean;
}

interface ElementNode {
  tag: string;
  children: unknown[];
  attributes: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Well-formedness diagnostic from the XML validator, or undefined when the
 * document is well-formed.
 */
export function xmlDiagnostic(xml: string): string | undefined {
  if (!xml || xml.trim().length === 0) {
    return 'XML data cannot be empty';
  }

  const result = XMLValidator.validate(xml);
  if (result === true) {
    return undefined;
  }

  const { msg, line, col } = result.err;
  return `${msg} (line ${line}, column ${col})`;
}

/**
 * Normalize an XML document into `{rootTag: subtree}`.
 * @throws ParseError on malformed XML
 */
export function normalizeXML(xml: string, options: XMLNormalizeOptions = {}): MappingValue {
  const diagnostic = xmlDiagnostic(xml);
  if (diagnostic !== undefined) {
    throw new ParseError(`Malformed XML: ${diagnostic}`);
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    removeNSPrefix: options.stripNamespaces ?? false,
  });

  const parsed: unknown = parser.parse(xml);
  const root = (Array.isArray(parsed) ? parsed : [])
    .map(toElementNode)
    .find((node): node is ElementNode => node !== undefined);

  if (!root) {
    throw new ParseError('XML document has no root element');
  }

  const entries = new Map<string, Repeated<Value>>();
  entries.set(root.tag, one(normalizeElement(root)));
  return mapping(entries);
}

function normalizeElement(node: ElementNode): Value {
  const entries = new Map<string, Repeated<Value>>();

  const attributeNames = Object.keys(node.attributes);
  if (attributeNames.length > 0) {
    const attributes = new Map<string, Repeated<Value>>();
    for (const name of attributeNames) {
      attributes.set(name, one(primitive(scalarText(node.attributes[name]))));
    }
    entries.set(ATTRIBUTES_KEY, one(mapping(attributes)));
  }

  let text = '';
  let hasChildElements = false;

  for (const child of node.children) {
    const element = toElementNode(child);
    if (element) {
      hasChildElements = true;
      appendRepeated(entries, element.tag, normalizeElement(element));
    } else if (isRecord(child) && TEXT_NODE_NAME in child) {
      text += scalarText(child[TEXT_NODE_NAME]);
    }
  }

  if (hasChildElements) {
    return mapping(entries);
  }

  const trimmed = text.trim();
  if (trimmed) {
    return primitive(trimmed);
  }

  return mapping(entries);
}

/**
 * preserveOrder nodes look like `{ tag: [...children], ':@': {attr: value} }`;
 * text nodes are `{ '#text': value }`.
 */
function toElementNode(node: unknown): ElementNode | undefined {
  if (!isRecord(node)) {
    return undefined;
  }

  const tag = Object.keys(node).find((key) => key !== ATTRIBUTE_GROUP && key !== TEXT_NODE_NAME);
  if (tag === undefined) {
    return undefined;
  }

  const children = node[tag];
  const attributes = node[ATTRIBUTE_GROUP];

  return {
    tag,
    children: Array.isArray(children) ? children : [],
    attributes: isRecord(attributes) ? attributes : {},
  };
}

function scalarText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}
