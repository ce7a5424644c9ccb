/**
 * DOCX element builders — the document model is grouped here, then each
 * element is rendered to `docx` paragraphs and tables.
 */

export { buildDocument, conformRow, countElements } from './document-model.js';
export { buildHeading, buildParagraph, buildListParagraphs, buildCodeBlock } from './paragraph.js';
export { buildTable } from './table.js';
export { createDocxFromMarkdown, parseMarkdownDocument, renderDocx } from './markdown-builder.js';
