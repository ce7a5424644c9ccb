/**
 * DOCX Utilities — Re-exports
 *
 * @module docx/utils
 */

// Markdown lines
export {
  normalizeLineEndings,
  isBlankLine,
  isPipeRow,
  isTableSeparatorLine,
  splitTableRow,
  parseHeadingLine,
  parseListMarker,
  matchFence,
  isClosingFence,
} from './markdown.js';
export type { FenceMarker } from './markdown.js';

// Paths
export { isDocxPath, replaceExtension, resolveOutputPath, tempPathFor } from './paths.js';
