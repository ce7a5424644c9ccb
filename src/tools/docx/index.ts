/**
 * Markdown → DOCX Library — Public API
 *
 * Re-exports only the symbols that external consumers need.
 *
 * @module docx
 */

// ── Parsing ─────────────────────────────────────────────────────────────────
export { segmentMarkdown, scanMarkdownBlocks } from './parsers/index.js';
export { buildDocument, conformRow } from './builders/index.js';

// ── Writing ─────────────────────────────────────────────────────────────────
export { createDocxFromMarkdown, parseMarkdownDocument, renderDocx } from './builders/index.js';
export { convertMarkdownFile } from './convert.js';
export { resolveOutputPath } from './utils/index.js';

// ── Reading back ────────────────────────────────────────────────────────────
export { readDocxOutline, summarizeOutline, describeOutline } from './structure.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  MarkdownBlock,
  ContentBlock,
  DocumentElement,
  MarkdownDocument,
  TableStyle,
  DocxOutline,
  OutlineSummary,
  ConvertOptions,
  ConversionResult,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode, isDocxError } from './errors.js';
