import {
  AlignmentType,
  Document,
  LevelFormat,
  Packer,
  Paragraph,
  Table,
} from 'docx';

import type { MarkdownDocument } from '../types.js';
import { DocxErrorCode, withErrorContext } from '../errors.js';
import {
  BODY_FONT,
  BODY_FONT_SIZE,
  LIST_INDENT,
  ORDERED_LIST_REFERENCE,
} from '../constants.js';
import { segmentMarkdown } from '../parsers/markdown-segmenter.js';
import { buildDocument } from './document-model.js';
import {
  buildCodeBlock,
  buildHeading,
  buildListParagraphs,
  buildParagraph,
} from './paragraph.js';
import { buildTable } from './table.js';

export function parseMarkdownDocument(markdown: string): MarkdownDocument {
  return buildDocument(segmentMarkdown(markdown));
}

export async function createDocxFromMarkdown(markdown: string): Promise<Buffer> {
  return withErrorContext(
    async () => renderDocx(parseMarkdownDocument(markdown)),
    DocxErrorCode.DOCX_CREATE_FAILED,
    { markdownLength: markdown.length }
  );
}

export async function renderDocx(document: MarkdownDocument): Promise<Buffer> {
  return withErrorContext(
    async () => {
      const children: (Paragraph | Table)[] = [];
      let listInstance = 0;

      for (const element of document.elements) {
        switch (element.type) {
          case 'heading':
            children.push(buildHeading(element.level, element.text));
            break;
          case 'paragraph':
            children.push(buildParagraph(element.text));
            break;
          case 'list':
            listInstance++;
            children.push(...buildListParagraphs(element.items, listInstance));
            break;
          case 'code':
            children.push(buildCodeBlock(element.lines));
            break;
          case 'table':
            children.push(buildTable(element));
            break;
        }
      }

      const doc = new Document({
        styles: {
          default: {
            document: {
              run: { font: BODY_FONT, size: BODY_FONT_SIZE },
            },
          },
        },
        numbering: {
          config: [
            {
              reference: ORDERED_LIST_REFERENCE,
              levels: [
                {
                  level: 0,
                  format: LevelFormat.DECIMAL,
                  text: '%1.',
                  alignment: AlignmentType.START,
                  style: { paragraph: { indent: LIST_INDENT } },
                },
              ],
            },
          ],
        },
        sections: [{
          properties: {},
          children,
        }],
      });

      return await Packer.toBuffer(doc);
    },
    DocxErrorCode.DOCX_CREATE_FAILED,
    { elementCount: document.elements.length }
  );
}
