import type {
  AttachResult,
  HandleAttacher,
} from '../types/association';
import type { HandleService } from '../types/handle';
import type { RepositoryObject } from '../types/repository';
import { upsertHandleIdentifier } from '../utils/dublin-core';
import { XmlError, parseHandleError } from '../utils/errors';
import { notice, operational } from '../utils/messages';
import type { XmlDocument } from '../utils/xml';
import {
  appendChild,
  childElementsNS,
  createElementNS,
  documentElement,
  namespaceURIOf,
  parseXml,
  serializeXml,
  splitQName,
  textContent,
} from '../utils/xml';

export const MODS_NS = 'http://www.loc.gov/mods/v3';

/**
 * Embeds a Handle URL into a parsed datastream
 * Returns whether the document changed
 */
export type HandleTransform = (doc: XmlDocument, handleUrl: string) => boolean;

/**
 * Set <mods:identifier type="hdl"> on a MODS record
 * The first hdl identifier is updated in place; otherwise one is appended
 */
export function modsIdentifierTransform(
  doc: XmlDocument,
  handleUrl: string
): boolean {
  const root = documentElement(doc);
  if (
    splitQName(root.name).localName !== 'mods' ||
    namespaceURIOf(root, [root]) !== MODS_NS
  ) {
    throw new XmlError(`expected a MODS record, found <${root.name}>`);
  }

  const existing = childElementsNS(root, [root], MODS_NS, 'identifier').find(
    (element) => element.attributes.type === 'hdl'
  );

  if (existing) {
    if (textContent(existing) === handleUrl) {
      return false;
    }
    existing.children = [{ type: 'text', value: handleUrl }];
    return true;
  }

  const identifier = createElementNS([root], MODS_NS, 'mods:identifier', handleUrl);
  identifier.attributes.type = 'hdl';
  appendChild(root, identifier);
  return true;
}

/**
 * Set the Handle dc:identifier on an oai_dc record
 */
export function dcIdentifierTransform(
  doc: XmlDocument,
  handleUrl: string
): boolean {
  return upsertHandleIdentifier(doc, handleUrl) !== 'unchanged';
}

export const BUILTIN_TRANSFORMS: Record<string, HandleTransform> = {
  mods: modsIdentifierTransform,
  dc: dcIdentifierTransform,
};

/**
 * Attaches Handles by running a named transform over a datastream's XML
 *
 * Transform names come from the `transform` field of an association.
 * Custom transforms are merged over the built-in ones.
 */
export class XmlHandleAttacher implements HandleAttacher {
  private readonly transforms: Map<string, HandleTransform>;

  constructor(
    private handles: HandleService,
    transforms: Record<string, HandleTransform> = {}
  ) {
    this.transforms = new Map(
      Object.entries({ ...BUILTIN_TRANSFORMS, ...transforms })
    );
  }

  async applyHandleToDatastream(
    object: RepositoryObject,
    dsid: string,
    transform: string
  ): Promise<AttachResult> {
    const pid = object.id;
    const apply = this.transforms.get(transform);

    if (!apply) {
      return {
        success: false,
        message: operational(
          'Unable to add the Handle to the {dsid} datastream of {pid}: no transform named {transform}.',
          { pid, dsid, transform }
        ),
      };
    }

    const datastream = object.datastream(dsid);
    if (!datastream) {
      return {
        success: false,
        message: operational(
          'Unable to add the Handle to {pid}: the object has no {dsid} datastream.',
          { pid, dsid }
        ),
      };
    }

    const handleUrl = this.handles.canonicalUrl(pid);

    try {
      const doc = parseXml(await datastream.getContent());

      if (!apply(doc, handleUrl)) {
        return {
          success: true,
          message: notice(
            'The {dsid} datastream of {pid} already references {handle}.',
            { pid, dsid, handle: handleUrl }
          ),
        };
      }

      await datastream.setContent(serializeXml(doc));
      return {
        success: true,
        message: notice('Added the Handle {handle} to the {dsid} datastream of {pid}.', {
          pid,
          dsid,
          handle: handleUrl,
        }),
      };
    } catch (error) {
      return {
        success: false,
        message: operational(
          'Unable to add the Handle to the {dsid} datastream of {pid}: {error}',
          { pid, dsid, error: parseHandleError(error) }
        ),
      };
    }
  }
}
