import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlError } from './errors';

/**
 * Minimal namespace-aware XML tree.
 *
 * fast-xml-parser runs in order-preserving mode so that edits keep sibling
 * order; its output is converted into the node types below, edited in place,
 * and converted back for the builder. Whitespace-only text is dropped on
 * parse and the builder pretty-prints, so parse + serialize is stable.
 *
 * Text is kept as written, except beside child elements or comments: the
 * builder puts those on their own indented lines, so the text around them
 * is trimmed. Text beside CDATA keeps its spaces.
 *
 * Documents with a DOCTYPE are rejected, since the parser would drop the
 * declaration and a write would lose it.
 */

export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

export interface XmlElement {
  type: 'element';
  /** Qualified name as written, e.g. "dc:identifier" */
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  type: 'text';
  value: string;
}

export interface XmlCData {
  type: 'cdata';
  value: string;
}

export interface XmlComment {
  type: 'comment';
  value: string;
}

/** Processing instruction, including the XML declaration */
export interface XmlInstruction {
  type: 'instruction';
  name: string;
  attributes: Record<string, string>;
}

export type XmlNode = XmlElement | XmlText | XmlCData | XmlComment | XmlInstruction;

export interface XmlDocument {
  children: XmlNode[];
}

const TEXT = '#text';
const COMMENT = '#comment';
const CDATA = '#cdata';
const ATTRIBUTES = ':@';
const ATTRIBUTE_PREFIX = '@_';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT,
  commentPropName: COMMENT,
  cdataPropName: CDATA,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
});

// Comments and processing instructions may come before the root element
const DOCTYPE_IN_PROLOG = /^\s*(?:(?:<\?[\s\S]*?\?>|<!--[\s\S]*?-->)\s*)*<!DOCTYPE/i;

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT,
  commentPropName: COMMENT,
  cdataPropName: CDATA,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  processEntities: true,
});

// =============================================================================
// Parse / serialize
// =============================================================================

/**
 * Parse XML text into a document
 * Throws XmlError if the text is not well-formed or declares a DOCTYPE
 */
export function parseXml(xml: string): XmlDocument {
  if (DOCTYPE_IN_PROLOG.test(xml)) {
    throw new XmlError('documents with a DOCTYPE declaration are not supported');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlError(validation.err.msg, {
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const parsed: unknown = parser.parse(xml);
  return { children: toNodes(parsed) };
}

/**
 * Serialize a document, pretty-printed with a trailing newline
 */
export function serializeXml(doc: XmlDocument): string {
  const xml: unknown = builder.build(toOrdered(doc.children));
  if (typeof xml !== 'string') {
    throw new XmlError('serializer produced no output');
  }
  return `${xml.trim()}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    attributes[name] = String(value);
  }
  return attributes;
}

/**
 * Text held by a comment or CDATA entry: [{ "#text": "..." }]
 */
function wrappedText(raw: unknown): string {
  if (!Array.isArray(raw)) {
    return '';
  }
  let text = '';
  for (const entry of raw) {
    if (isRecord(entry) && entry[TEXT] !== undefined) {
      text += String(entry[TEXT]);
    }
  }
  return text;
}

function toNodes(raw: unknown): XmlNode[] {
  const nodes: XmlNode[] = [];
  if (!Array.isArray(raw)) {
    return nodes;
  }

  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    const attributes = toAttributes(entry[ATTRIBUTES]);

    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES) {
        continue;
      }
      if (key === TEXT) {
        nodes.push({ type: 'text', value: String(value) });
      } else if (key === COMMENT) {
        nodes.push({ type: 'comment', value: wrappedText(value) });
      } else if (key === CDATA) {
        nodes.push({ type: 'cdata', value: wrappedText(value) });
      } else if (key.startsWith('?')) {
        nodes.push({ type: 'instruction', name: key.slice(1), attributes });
      } else {
        nodes.push({
          type: 'element',
          name: key,
          attributes,
          children: toNodes(value),
        });
      }
    }
  }

  return normalizeText(nodes);
}

function isWhitespace(node: XmlNode): boolean {
  return node.type === 'text' && node.value.trim() === '';
}

/**
 * Drop whitespace-only text; trim text that shares a parent with elements
 * or comments
 */
function normalizeText(nodes: XmlNode[]): XmlNode[] {
  const indented = nodes.some(
    (node) => node.type === 'element' || node.type === 'comment'
  );

  return nodes
    .filter((node) => !isWhitespace(node))
    .map((node): XmlNode =>
      indented && node.type === 'text'
        ? { type: 'text', value: node.value.trim() }
        : node
    );
}

function toOrderedAttributes(
  attributes: Record<string, string>
): Record<string, Record<string, string>> {
  const names = Object.keys(attributes);
  if (names.length === 0) {
    return {};
  }
  const prefixed: Record<string, string> = {};
  for (const name of names) {
    prefixed[`${ATTRIBUTE_PREFIX}${name}`] = attributes[name];
  }
  return { [ATTRIBUTES]: prefixed };
}

function toOrdered(nodes: XmlNode[]): Record<string, unknown>[] {
  return nodes.map((node) => {
    switch (node.type) {
      case 'text':
        return { [TEXT]: node.value };
      case 'cdata':
        return { [CDATA]: [{ [TEXT]: node.value }] };
      case 'comment':
        return { [COMMENT]: [{ [TEXT]: node.value }] };
      case 'instruction':
        return {
          [`?${node.name}`]: [{ [TEXT]: '' }],
          ...toOrderedAttributes(node.attributes),
        };
      case 'element':
        return {
          [node.name]: toOrdered(node.children),
          ...toOrderedAttributes(node.attributes),
        };
    }
  });
}

// =============================================================================
// Queries
// =============================================================================

export function isElement(node: XmlNode): node is XmlElement {
  return node.type === 'element';
}

/**
 * Root element of the document
 * Throws XmlError if there is none
 */
export function documentElement(doc: XmlDocument): XmlElement {
  const root = doc.children.find(isElement);
  if (!root) {
    throw new XmlError('document has no root element');
  }
  return root;
}

/**
 * Concatenated text and CDATA of a node and its descendants
 */
export function textContent(node: XmlNode): string {
  switch (node.type) {
    case 'text':
    case 'cdata':
      return node.value;
    case 'element':
      return node.children.map(textContent).join('');
    default:
      return '';
  }
}

export function splitQName(name: string): {
  prefix: string | null;
  localName: string;
} {
  const index = name.indexOf(':');
  if (index === -1) {
    return { prefix: null, localName: name };
  }
  return { prefix: name.slice(0, index), localName: name.slice(index + 1) };
}

/**
 * Resolve a prefix (null for the default namespace) against a scope.
 * `scope` is the chain of elements from the root down to the element the
 * name appears on, innermost last.
 */
export function lookupNamespaceURI(
  prefix: string | null,
  scope: readonly XmlElement[]
): string | undefined {
  if (prefix === 'xml') {
    return XML_NS;
  }
  const declaration = prefix === null ? 'xmlns' : `xmlns:${prefix}`;
  for (let i = scope.length - 1; i >= 0; i--) {
    const value = scope[i].attributes[declaration];
    if (value !== undefined) {
      return value === '' ? undefined : value;
    }
  }
  return undefined;
}

/**
 * Prefix bound to a namespace in scope: a string, null for the default
 * namespace, or undefined when the namespace is not bound (or is shadowed).
 */
export function lookupPrefix(
  namespaceURI: string,
  scope: readonly XmlElement[]
): string | null | undefined {
  for (let i = scope.length - 1; i >= 0; i--) {
    for (const [name, value] of Object.entries(scope[i].attributes)) {
      if (value !== namespaceURI) {
        continue;
      }
      const prefix =
        name === 'xmlns' ? null : name.startsWith('xmlns:') ? name.slice(6) : undefined;
      if (prefix === undefined) {
        continue;
      }
      if (lookupNamespaceURI(prefix, scope) === namespaceURI) {
        return prefix;
      }
    }
  }
  return undefined;
}

/**
 * Namespace URI of an element; `scope` ends with the element itself
 */
export function namespaceURIOf(
  element: XmlElement,
  scope: readonly XmlElement[]
): string | undefined {
  return lookupNamespaceURI(splitQName(element.name).prefix, scope);
}

/**
 * Child elements of `parent` with the given namespace and local name.
 * `scope` ends with `parent`.
 */
export function childElementsNS(
  parent: XmlElement,
  scope: readonly XmlElement[],
  namespaceURI: string,
  localName: string
): XmlElement[] {
  return parent.children.filter(
    (child): child is XmlElement =>
      isElement(child) &&
      splitQName(child.name).localName === localName &&
      namespaceURIOf(child, [...scope, child]) === namespaceURI
  );
}

// =============================================================================
// Construction and edits
// =============================================================================

/**
 * Build an element in `namespaceURI` for insertion under the last element
 * of `scope`. Reuses the prefix already bound to the namespace; otherwise
 * declares the prefix of `qualifiedName` on the new element.
 */
export function createElementNS(
  scope: readonly XmlElement[],
  namespaceURI: string,
  qualifiedName: string,
  text?: string
): XmlElement {
  const { prefix: preferred, localName } = splitQName(qualifiedName);
  const children: XmlNode[] =
    text === undefined ? [] : [{ type: 'text', value: text }];

  const bound = lookupPrefix(namespaceURI, scope);
  if (bound !== undefined) {
    return {
      type: 'element',
      name: bound === null ? localName : `${bound}:${localName}`,
      attributes: {},
      children,
    };
  }

  const declaration = preferred === null ? 'xmlns' : `xmlns:${preferred}`;
  return {
    type: 'element',
    name: qualifiedName,
    attributes: { [declaration]: namespaceURI },
    children,
  };
}

export function appendChild(parent: XmlElement, child: XmlNode): void {
  parent.children.push(child);
}

/**
 * Swap `oldChild` for `newChild` at the same position among its siblings
 */
export function replaceChild(
  parent: XmlElement,
  newChild: XmlNode,
  oldChild: XmlNode
): void {
  const index = parent.children.indexOf(oldChild);
  if (index === -1) {
    throw new XmlError(`node to replace is not a child of <${parent.name}>`);
  }
  parent.children.splice(index, 1, newChild);
}

export function removeChild(parent: XmlElement, child: XmlNode): void {
  const index = parent.children.indexOf(child);
  if (index === -1) {
    throw new XmlError(`node to remove is not a child of <${parent.name}>`);
  }
  parent.children.splice(index, 1);
}
