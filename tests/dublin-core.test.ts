import { describe, expect, it } from 'vitest';
import {
  DC_NS,
  OAI_DC_NS,
  handleIdentifiers,
  removeHandleIdentifier,
  upsertHandleIdentifier,
} from '../src/utils/dublin-core';
import { XmlError } from '../src/utils/errors';
import {
  childElementsNS,
  documentElement,
  parseXml,
  serializeXml,
  textContent,
} from '../src/utils/xml';
import { dcRecord } from './helpers/fakes';

const HANDLE = 'http://hdl.handle.net/20.500.12345/islandora:7';
const STALE = 'http://hdl.handle.net/20.500.99999/islandora:7';

function identifierTexts(xml: string): string[] {
  const root = documentElement(parseXml(xml));
  return childElementsNS(root, [root], DC_NS, 'identifier').map(textContent);
}

describe('upsertHandleIdentifier', () => {
  it('appends the Handle as the last child when there is none', () => {
    const doc = parseXml(dcRecord('islandora:7'));

    expect(upsertHandleIdentifier(doc, HANDLE)).toBe('appended');

    const root = documentElement(doc);
    const last = root.children[root.children.length - 1];
    expect(last.type === 'element' && last.name).toBe('dc:identifier');
    expect(textContent(last)).toBe(HANDLE);
    expect(handleIdentifiers(doc)).toEqual([HANDLE]);
  });

  it('leaves a matching Handle alone', () => {
    const doc = parseXml(dcRecord('islandora:7', HANDLE));

    expect(upsertHandleIdentifier(doc, HANDLE)).toBe('unchanged');
    expect(handleIdentifiers(doc)).toEqual([HANDLE]);
  });

  it('replaces a stale Handle in place', () => {
    const doc = parseXml(dcRecord(STALE, 'islandora:7'));

    expect(upsertHandleIdentifier(doc, HANDLE)).toBe('replaced');
    expect(identifierTexts(serializeXml(doc))).toEqual([HANDLE, 'islandora:7']);
  });

  it('only fixes the first of several Handle identifiers', () => {
    const other = 'http://hdl.handle.net/20.500.11111/islandora:7';
    const doc = parseXml(dcRecord(STALE, other));

    expect(upsertHandleIdentifier(doc, HANDLE)).toBe('replaced');
    expect(handleIdentifiers(doc)).toEqual([HANDLE, other]);
  });

  it('ignores identifiers that are not Handle URLs', () => {
    const doc = parseXml(dcRecord('https://example.org/islandora:7'));

    expect(upsertHandleIdentifier(doc, HANDLE)).toBe('appended');
    expect(identifierTexts(serializeXml(doc))).toEqual([
      'https://example.org/islandora:7',
      HANDLE,
    ]);
  });

  it('uses the prefix the record binds to the dc namespace', () => {
    const doc = parseXml(
      `<oai_dc:dc xmlns:oai_dc="${OAI_DC_NS}" xmlns:d="${DC_NS}"><d:title>x</d:title></oai_dc:dc>`
    );

    upsertHandleIdentifier(doc, HANDLE);

    const root = documentElement(doc);
    const last = root.children[root.children.length - 1];
    expect(last).toEqual({
      type: 'element',
      name: 'd:identifier',
      attributes: {},
      children: [{ type: 'text', value: HANDLE }],
    });
  });

  it('declares the dc namespace on the new element when the record lacks it', () => {
    const doc = parseXml(`<oai_dc:dc xmlns:oai_dc="${OAI_DC_NS}"/>`);

    upsertHandleIdentifier(doc, HANDLE);

    expect(documentElement(doc).children).toEqual([
      {
        type: 'element',
        name: 'dc:identifier',
        attributes: { 'xmlns:dc': DC_NS },
        children: [{ type: 'text', value: HANDLE }],
      },
    ]);
    expect(handleIdentifiers(doc)).toEqual([HANDLE]);
  });

  it('converges: a second upsert after serializing changes nothing', () => {
    const doc = parseXml(dcRecord('islandora:7'));
    upsertHandleIdentifier(doc, HANDLE);

    const reparsed = parseXml(serializeXml(doc));
    expect(upsertHandleIdentifier(reparsed, HANDLE)).toBe('unchanged');
    expect(handleIdentifiers(reparsed)).toEqual([HANDLE]);
  });

  it('rejects a record that is not oai_dc', () => {
    const doc = parseXml('<mods xmlns="http://www.loc.gov/mods/v3"/>');
    expect(() => upsertHandleIdentifier(doc, HANDLE)).toThrow(XmlError);
  });
});

describe('removeHandleIdentifier', () => {
  it('removes every identifier equal to the Handle URL', () => {
    const doc = parseXml(dcRecord(HANDLE, 'islandora:7', HANDLE));

    expect(removeHandleIdentifier(doc, HANDLE)).toBe(2);
    expect(identifierTexts(serializeXml(doc))).toEqual(['islandora:7']);
  });

  it('keeps Handle identifiers that point elsewhere', () => {
    const doc = parseXml(dcRecord(STALE));

    expect(removeHandleIdentifier(doc, HANDLE)).toBe(0);
    expect(handleIdentifiers(doc)).toEqual([STALE]);
  });

  it('leaves the rest of the record as it was before the Handle was added', () => {
    const original = [
      `<oai_dc:dc xmlns:oai_dc="${OAI_DC_NS}" xmlns:dc="${DC_NS}">`,
      '  <dc:title>&#169; caf&#xE9;</dc:title>',
      '  <dc:description>a <![CDATA[<b>]]> c</dc:description>',
      '</oai_dc:dc>',
    ].join('\n');

    const withHandle = parseXml(original);
    upsertHandleIdentifier(withHandle, HANDLE);
    const restored = parseXml(serializeXml(withHandle));
    removeHandleIdentifier(restored, HANDLE);
    const xml = serializeXml(restored);

    expect(xml).toBe(serializeXml(parseXml(original)));
    expect(xml).toContain('<dc:title>\u00a9 caf\u00e9</dc:title>');
    expect(xml).toContain('<dc:description>a <![CDATA[<b>]]> c</dc:description>');
  });
});
