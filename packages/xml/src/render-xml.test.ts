/**
 * Tests for DocumentNode rendering
 */

import { describe, it, expect } from 'vitest';
import type { DocumentNode } from '@invoice-codec/contracts';
import { renderXml, assignPrefixes } from './render-xml.js';
import { parseXml } from './parse-xml.js';

const NS_A = 'urn:test:a';
const NS_B = 'urn:test:b';

function sampleTree(): DocumentNode {
  return {
    tag: { namespace: NS_A, localName: 'Root' },
    attributes: {},
    children: [
      {
        tag: { namespace: NS_B, localName: 'Amount' },
        attributes: { currencyID: 'EUR' },
        children: [],
        text: '12.50',
      },
      {
        tag: { namespace: NS_B, localName: 'Note' },
        attributes: {},
        children: [],
        text: 'Fish & Chips <large>',
      },
      {
        tag: { namespace: NS_A, localName: 'Empty' },
        attributes: {},
        children: [],
      },
    ],
  };
}

describe('assignPrefixes', () => {
  it('should use preferred prefixes in order of first use', () => {
    const prefixes = assignPrefixes(sampleTree(), { [NS_A]: 'a', [NS_B]: 'b' });

    expect([...prefixes.entries()]).toEqual([
      [NS_A, 'a'],
      [NS_B, 'b'],
    ]);
  });

  it('should number namespaces without a preferred prefix', () => {
    const prefixes = assignPrefixes(sampleTree(), { [NS_B]: 'b' });

    expect([...prefixes.entries()]).toEqual([
      [NS_A, 'ns0'],
      [NS_B, 'b'],
    ]);
  });

  it('should not reuse a prefix that is already bound', () => {
    const prefixes = assignPrefixes(sampleTree(), { [NS_A]: 'x', [NS_B]: 'x' });

    expect(prefixes.get(NS_A)).toBe('x');
    expect(prefixes.get(NS_B)).toBe('ns0');
  });
});

describe('renderXml', () => {
  it('should declare namespaces on the root element', () => {
    const xml = renderXml(sampleTree(), { prefixes: { [NS_A]: 'a', [NS_B]: 'b' } });

    expect(xml.startsWith('<a:Root')).toBe(true);
    expect(xml).toContain(`xmlns:a="${NS_A}"`);
    expect(xml).toContain(`xmlns:b="${NS_B}"`);
  });

  it('should render leaf text and attributes', () => {
    const xml = renderXml(sampleTree(), { prefixes: { [NS_A]: 'a', [NS_B]: 'b' } });

    expect(xml).toContain('<b:Amount currencyID="EUR">12.50</b:Amount>');
  });

  it('should produce output that parses back to the same tree', () => {
    const tree = sampleTree();

    expect(parseXml(renderXml(tree))).toEqual(tree);
  });

  it('should keep edge whitespace and non-ASCII text through a parse', () => {
    const tree: DocumentNode = {
      tag: { namespace: NS_A, localName: 'Root' },
      attributes: {},
      children: [
        {
          tag: { namespace: NS_A, localName: 'Name' },
          attributes: {},
          children: [],
          text: '  München & Co  ',
        },
      ],
    };

    const xml = renderXml(tree);

    expect(xml).toContain('>  München &amp; Co  <');
    expect(parseXml(xml)).toEqual(tree);
  });
});
