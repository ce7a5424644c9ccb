/**
 * Markdown Block Segmenter
 *
 * Splits Markdown source into an ordered sequence of typed blocks.
 *
 * Lines are classified one at a time by a small state machine with three
 * modes: `default`, `inCodeBlock` and `inTable`. All scanning state lives
 * in a {@link SegmenterState} created per call, so segmenting is reentrant.
 *
 * Blank lines inside a table (a blank preceded by a table row and followed,
 * after any further blanks, by another pipe row) are absorbed so the table
 * stays whole. Any other blank line ends the run before it.
 */

import type {
  ContentBlock,
  HeadingBlock,
  MarkdownBlock,
} from '../types.js';
import {
  type FenceMarker,
  isBlankLine,
  isClosingFence,
  isPipeRow,
  isTableSeparatorLine,
  matchFence,
  normalizeLineEndings,
  parseHeadingLine,
  parseListMarker,
  splitTableRow,
} from '../utils/markdown.js';

export type SegmenterMode = 'default' | 'inCodeBlock' | 'inTable';

/**
 * Outside a code block each line falls into exactly one of these,
 * tested in this order.
 */
export type LineToken =
  | { kind: 'heading'; block: HeadingBlock }
  | { kind: 'separator' }
  | { kind: 'tableRow'; cells: string[] }
  | { kind: 'fence'; marker: FenceMarker }
  | { kind: 'listItem'; ordered: boolean; text: string }
  | { kind: 'blank' }
  | { kind: 'paragraph'; text: string };

export function classifyLine(line: string): LineToken {
  const heading = parseHeadingLine(line);
  if (heading) {
    return { kind: 'heading', block: { type: 'heading', level: heading.level, text: heading.text } };
  }

  if (isPipeRow(line)) {
    return isTableSeparatorLine(line)
      ? { kind: 'separator' }
      : { kind: 'tableRow', cells: splitTableRow(line) };
  }

  const fence = matchFence(line);
  if (fence) return { kind: 'fence', marker: fence };

  const listItem = parseListMarker(line);
  if (listItem) return { kind: 'listItem', ...listItem };

  if (isBlankLine(line)) return { kind: 'blank' };

  return { kind: 'paragraph', text: line.trim() };
}

/** Accumulator threaded through one segmentation pass. */
class SegmenterState {
  mode: SegmenterMode = 'default';
  readonly blocks: MarkdownBlock[] = [];

  private fence: FenceMarker | null = null;
  private linesInFence = 0;

  private get previous(): MarkdownBlock | undefined {
    return this.blocks[this.blocks.length - 1];
  }

  push(block: MarkdownBlock): void {
    this.blocks.push(block);
    this.mode = block.type === 'tableRow' ? 'inTable' : 'default';
  }

  pushTableRow(cells: string[]): void {
    this.push({ type: 'tableRow', cells, isHeader: this.previous?.type !== 'tableRow' });
  }

  pushListItem(ordered: boolean, text: string): void {
    this.push({ type: 'listItem', ordered, text, startsRun: this.previous?.type !== 'listItem' });
  }

  openFence(marker: FenceMarker): void {
    this.fence = marker;
    this.linesInFence = 0;
    this.mode = 'inCodeBlock';
  }

  /** A line repeating the opening marker closes the block; anything else is kept verbatim. */
  consumeCodeLine(line: string): void {
    if (this.fence && isClosingFence(line, this.fence)) {
      this.fence = null;
      this.mode = 'default';
      return;
    }
    this.blocks.push({ type: 'codeLine', text: line, startsRun: this.linesInFence === 0 });
    this.linesInFence++;
  }
}

function nextNonBlankIndex(lines: readonly string[], from: number): number {
  let i = from;
  while (i < lines.length && isBlankLine(lines[i])) i++;
  return i;
}

/**
 * Segment Markdown into blocks, blank lines included.
 * Most callers want {@link segmentMarkdown}.
 */
export function scanMarkdownBlocks(markdown: string): MarkdownBlock[] {
  const lines = normalizeLineEndings(markdown).split('\n');
  const state = new SegmenterState();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (state.mode === 'inCodeBlock') {
      state.consumeCodeLine(line);
      continue;
    }

    const token = classifyLine(line);
    switch (token.kind) {
      case 'heading':
        state.push(token.block);
        break;
      case 'separator':
        // Marks the row above as the header; that is already positional.
        break;
      case 'tableRow':
        state.pushTableRow(token.cells);
        break;
      case 'fence':
        state.openFence(token.marker);
        break;
      case 'listItem':
        state.pushListItem(token.ordered, token.text);
        break;
      case 'blank': {
        if (state.mode === 'inTable') {
          const next = nextNonBlankIndex(lines, i + 1);
          if (next < lines.length && isPipeRow(lines[next])) {
            i = next - 1;
            break;
          }
        }
        state.push({ type: 'blank' });
        break;
      }
      case 'paragraph':
        state.push({ type: 'paragraph', text: token.text });
        break;
    }
  }

  return state.blocks;
}

/** Segment Markdown into the content blocks the document builder consumes. */
export function segmentMarkdown(markdown: string): ContentBlock[] {
  return scanMarkdownBlocks(markdown).filter(
    (block): block is ContentBlock => block.type !== 'blank',
  );
}
