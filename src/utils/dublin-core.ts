import { HANDLE_RESOLVER } from '../types/handle';
import { XmlError } from './errors';
import type { XmlDocument, XmlElement } from './xml';
import {
  appendChild,
  childElementsNS,
  createElementNS,
  documentElement,
  namespaceURIOf,
  removeChild,
  replaceChild,
  splitQName,
  textContent,
} from './xml';

export const OAI_DC_NS = 'http://www.openarchives.org/OAI/2.0/oai_dc/';
export const DC_NS = 'http://purl.org/dc/elements/1.1/';

export const DC_DSID = 'DC';

export type DublinCoreUpdate = 'unchanged' | 'replaced' | 'appended';

/**
 * The oai_dc:dc root of a Dublin Core record
 * Throws XmlError for any other document
 */
function dublinCoreRoot(doc: XmlDocument): XmlElement {
  const root = documentElement(doc);
  if (
    splitQName(root.name).localName !== 'dc' ||
    namespaceURIOf(root, [root]) !== OAI_DC_NS
  ) {
    throw new XmlError(`expected an oai_dc:dc record, found <${root.name}>`);
  }
  return root;
}

function identifiers(root: XmlElement): XmlElement[] {
  return childElementsNS(root, [root], DC_NS, 'identifier');
}

function isHandleIdentifier(element: XmlElement): boolean {
  return textContent(element).startsWith(HANDLE_RESOLVER);
}

/**
 * Text of every dc:identifier that holds a Handle URL
 */
export function handleIdentifiers(doc: XmlDocument): string[] {
  return identifiers(dublinCoreRoot(doc))
    .filter(isHandleIdentifier)
    .map(textContent);
}

/**
 * Make the record carry `handleUrl` as its Handle identifier.
 *
 * Only the first existing Handle identifier is considered: it is left alone
 * when it already matches, otherwise it is replaced in place. Without one, a
 * new dc:identifier is appended as the last child of the root.
 */
export function upsertHandleIdentifier(
  doc: XmlDocument,
  handleUrl: string
): DublinCoreUpdate {
  const root = dublinCoreRoot(doc);
  const existing = identifiers(root).find(isHandleIdentifier);

  if (existing && textContent(existing) === handleUrl) {
    return 'unchanged';
  }

  const identifier = createElementNS([root], DC_NS, 'dc:identifier', handleUrl);
  if (existing) {
    replaceChild(root, identifier, existing);
    return 'replaced';
  }

  appendChild(root, identifier);
  return 'appended';
}

/**
 * Drop every dc:identifier whose text is exactly `handleUrl`
 * Returns how many were removed
 */
export function removeHandleIdentifier(
  doc: XmlDocument,
  handleUrl: string
): number {
  const root = dublinCoreRoot(doc);
  const matches = identifiers(root).filter(
    (element) => textContent(element) === handleUrl
  );
  for (const element of matches) {
    removeChild(root, element);
  }
  return matches.length;
}
