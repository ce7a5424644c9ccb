/**
 * DOCX Parsers
 * Markdown is split into blocks here before the builders group them.
 */

export { classifyLine, scanMarkdownBlocks, segmentMarkdown } from './markdown-segmenter.js';
export type { LineToken, SegmenterMode } from './markdown-segmenter.js';
