/**
 * DOCX Outline Reader
 *
 * Reads the body of a .docx back into an ordered outline of paragraphs and
 * tables. The converter uses it to report what it wrote; tests use it to
 * check structure without depending on byte-level output.
 */

import type {
  DocxOutline,
  OutlineCell,
  OutlineElement,
  OutlineSummary,
} from './types.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { getDocumentXml, loadDocxZip } from './zip.js';
import {
  childElements,
  getBody,
  getParagraphAlignment,
  getParagraphNumbering,
  getParagraphStyle,
  getParagraphText,
  getRuns,
  isRunBold,
  parseXml,
} from './dom.js';

const HEADING_STYLE = /^Heading[1-9]$/;

function readCell(tc: Element): OutlineCell {
  const paragraphs = childElements(tc).filter((child) => child.nodeName === 'w:p');
  const runs = paragraphs.flatMap(getRuns);

  return {
    text: paragraphs.map(getParagraphText).join('\n'),
    bold: runs.length > 0 && runs.every(isRunBold),
    alignment: paragraphs.length > 0 ? getParagraphAlignment(paragraphs[0]) : null,
  };
}

function readTable(tbl: Element): OutlineCell[][] {
  return childElements(tbl)
    .filter((child) => child.nodeName === 'w:tr')
    .map((tr) =>
      childElements(tr)
        .filter((child) => child.nodeName === 'w:tc')
        .map(readCell),
    );
}

/**
 * Parse a DOCX buffer into its body outline.
 *
 * @throws {DocxError} INVALID_DOCX if the archive or its body is missing
 */
export function readDocxOutline(buffer: Buffer): DocxOutline {
  const zip = loadDocxZip(buffer);
  const doc = parseXml(getDocumentXml(zip));
  const body = getBody(doc);

  if (!body) {
    throw new DocxError('Invalid DOCX file: <w:body> not found', DocxErrorCode.INVALID_DOCX);
  }

  const elements: OutlineElement[] = [];
  childElements(body).forEach((child, bodyChildIndex) => {
    if (child.nodeName === 'w:p') {
      elements.push({
        kind: 'paragraph',
        bodyChildIndex,
        style: getParagraphStyle(child) || null,
        text: getParagraphText(child),
        numbering: getParagraphNumbering(child),
      });
    } else if (child.nodeName === 'w:tbl') {
      elements.push({ kind: 'table', bodyChildIndex, rows: readTable(child) });
    }
  });

  return { elements };
}

export function isHeadingStyle(style: string | null): boolean {
  return style !== null && HEADING_STYLE.test(style);
}

export function summarizeOutline(outline: DocxOutline): OutlineSummary {
  const summary: OutlineSummary = { headings: 0, paragraphs: 0, listItems: 0, tables: 0 };

  for (const element of outline.elements) {
    if (element.kind === 'table') summary.tables++;
    else if (isHeadingStyle(element.style)) summary.headings++;
    else if (element.numbering) summary.listItems++;
    else summary.paragraphs++;
  }

  return summary;
}

/** One line per element, e.g. `Heading1: Demo Document` or `table 3x2`. */
export function describeOutline(outline: DocxOutline): string[] {
  return outline.elements.map((element) => {
    if (element.kind === 'table') {
      const columns = element.rows[0]?.length ?? 0;
      return `table ${element.rows.length}x${columns}`;
    }
    return `${element.style ?? 'Normal'}: ${element.text}`;
  });
}
