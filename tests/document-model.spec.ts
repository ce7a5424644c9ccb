/**
 * Tests for grouping segmented blocks into document elements
 */
import { describe, it, expect } from 'vitest';
import {
  buildDocument,
  conformRow,
  countElements,
} from '../src/tools/docx/builders/document-model.js';
import { parseMarkdownDocument } from '../src/tools/docx/builders/markdown-builder.js';
import { TABLE_STYLE } from '../src/tools/docx/constants.js';
import type { DocumentElement } from '../src/tools/docx/types.js';

function tables(elements: readonly DocumentElement[]) {
  return elements.flatMap((element) => (element.type === 'table' ? [element] : []));
}

describe('buildDocument', () => {
  it('builds the demo document', () => {
    const markdown = [
      '# Demo Document',
      '',
      'Some intro text.',
      '',
      '| Name  | Age | Role    |',
      '|-------|-----|---------|',
      '| Alice |  30 | Engineer|',
      '| Bob   |  25 | Analyst |',
    ].join('\n');

    expect(parseMarkdownDocument(markdown).elements).toEqual([
      { type: 'heading', level: 1, text: 'Demo Document' },
      { type: 'paragraph', text: 'Some intro text.' },
      {
        type: 'table',
        header: ['Name', 'Age', 'Role'],
        rows: [
          ['Alice', '30', 'Engineer'],
          ['Bob', '25', 'Analyst'],
        ],
        style: TABLE_STYLE,
      },
    ]);
  });

  it('produces no elements for no blocks', () => {
    expect(buildDocument([]).elements).toEqual([]);
  });

  it('produces no tables for input without pipe rows', () => {
    const doc = parseMarkdownDocument('# Title\n\nText\n\n- item\n\n```\ncode | here\n```');
    expect(countElements(doc, 'table')).toBe(0);
    expect(doc.elements.map((e) => e.type)).toEqual(['heading', 'paragraph', 'list', 'code']);
  });

  describe('tables', () => {
    it('has M+1 rows of N cells for an N-column table with M data rows', () => {
      const doc = parseMarkdownDocument('| a | b | c | d |\n|---|---|---|---|\n| 1 | 2 | 3 | 4 |\n| 5 | 6 | 7 | 8 |\n| 9 | 10 | 11 | 12 |');
      const [table] = tables(doc.elements);
      expect(table.header).toHaveLength(4);
      expect(table.rows).toHaveLength(3);
      expect(table.rows.every((row) => row.length === 4)).toBe(true);
    });

    it('pads short rows and truncates long rows to the header width', () => {
      const doc = parseMarkdownDocument('| a | b | c |\n|---|---|---|\n| 1 |\n| 1 | 2 | 3 | 4 | 5 |\n| x | y |');
      expect(tables(doc.elements)[0].rows).toEqual([
        ['1', '', ''],
        ['1', '2', '3'],
        ['x', 'y', ''],
      ]);
    });

    it('keeps a table split only by blank lines as one table', () => {
      const doc = parseMarkdownDocument('| a | b |\n|---|---|\n| 1 | 2 |\n\n\n| 3 | 4 |');
      expect(countElements(doc, 'table')).toBe(1);
      expect(tables(doc.elements)[0].rows).toEqual([
        ['1', '2'],
        ['3', '4'],
      ]);
    });

    it('splits tables separated by other content', () => {
      const doc = parseMarkdownDocument('| a |\n|---|\n| 1 |\n\nBetween\n\n| b |\n| 2 |');
      const found = tables(doc.elements);
      expect(found).toHaveLength(2);
      expect(found[0].header).toEqual(['a']);
      expect(found[1].header).toEqual(['b']);
      expect(found[1].rows).toEqual([['2']]);
    });

    it('builds a header-only table', () => {
      const doc = buildDocument([{ type: 'tableRow', cells: ['only', 'header'], isHeader: true }]);
      expect(doc.elements).toEqual([
        { type: 'table', header: ['only', 'header'], rows: [], style: TABLE_STYLE },
      ]);
    });

    it('treats a row flagged as header as the start of the next table', () => {
      const doc = buildDocument([
        { type: 'tableRow', cells: ['a'], isHeader: true },
        { type: 'tableRow', cells: ['1'], isHeader: false },
        { type: 'tableRow', cells: ['b'], isHeader: true },
      ]);
      expect(tables(doc.elements).map((t) => t.header)).toEqual([['a'], ['b']]);
    });
  });

  describe('lists', () => {
    it('groups contiguous items and keeps each ordered flag', () => {
      const doc = parseMarkdownDocument('- first\n1. second\n* third');
      expect(doc.elements).toEqual([
        {
          type: 'list',
          items: [
            { ordered: false, text: 'first' },
            { ordered: true, text: 'second' },
            { ordered: false, text: 'third' },
          ],
        },
      ]);
    });

    it('starts a second list after a blank line', () => {
      const doc = parseMarkdownDocument('1. a\n2. b\n\n1. c');
      expect(doc.elements).toEqual([
        { type: 'list', items: [{ ordered: true, text: 'a' }, { ordered: true, text: 'b' }] },
        { type: 'list', items: [{ ordered: true, text: 'c' }] },
      ]);
    });
  });

  describe('code', () => {
    it('joins the lines of one fence into one element', () => {
      const doc = parseMarkdownDocument('```\nconst a = 1;\n\nconst b = 2;\n```');
      expect(doc.elements).toEqual([{ type: 'code', lines: ['const a = 1;', '', 'const b = 2;'] }]);
    });

    it('keeps adjacent fences as separate elements', () => {
      const doc = parseMarkdownDocument('```\none\n```\n```\ntwo\n```');
      expect(doc.elements).toEqual([
        { type: 'code', lines: ['one'] },
        { type: 'code', lines: ['two'] },
      ]);
    });
  });
});

describe('conformRow', () => {
  it('returns exactly the requested number of cells', () => {
    expect(conformRow([], 2)).toEqual(['', '']);
    expect(conformRow(['a', 'b', 'c'], 2)).toEqual(['a', 'b']);
    expect(conformRow(['a', 'b'], 2)).toEqual(['a', 'b']);
  });

  it('does not modify its input', () => {
    const cells = ['a'];
    conformRow(cells, 3);
    expect(cells).toEqual(['a']);
  });
});
