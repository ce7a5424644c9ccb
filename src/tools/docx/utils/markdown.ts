/**
 * Markdown Line Utilities
 *
 * Pure predicates and splitters for single Markdown source lines.
 * Used by the block segmenter; none of them carry state between lines.
 *
 * @module docx/utils/markdown
 */

import type { HeadingLevelNumber } from '../types.js';

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const BULLET_PATTERN = /^[-*+]\s+(.*)$/;
const NUMBERED_PATTERN = /^\d+\.\s+(.*)$/;
const SEPARATOR_CELL_PATTERN = /^:?-+:?$/;

export type FenceMarker = '```' | '~~~';

/** Convert CRLF and lone CR line endings to LF. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Match an ATX heading. Levels deeper than three are clamped to three,
 * the deepest heading style the converter emits.
 */
export function parseHeadingLine(line: string): { level: HeadingLevelNumber; text: string } | null {
  const match = line.trim().match(HEADING_PATTERN);
  if (!match) return null;

  const depth = match[1].length;
  const level: HeadingLevelNumber = depth === 1 ? 1 : depth === 2 ? 2 : 3;
  return { level, text: match[2].trim() };
}

/** A pipe row starts and ends with `|` once trimmed. Separator rows are pipe rows too. */
export function isPipeRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= 2 && trimmed.startsWith('|') && trimmed.endsWith('|');
}

/** `|---|:--:|--:|` — only dashes, colons, pipes and spaces. Empty cells are ignored, one dash cell is required. */
export function isTableSeparatorLine(line: string): boolean {
  if (!isPipeRow(line)) return false;

  let validParts = 0;
  for (const cell of splitTableRow(line)) {
    if (cell.length === 0) continue;
    if (!SEPARATOR_CELL_PATTERN.test(cell)) return false;
    validParts++;
  }
  return validParts > 0;
}

/**
 * Split a pipe row into trimmed cell texts. The outer border pipes are
 * removed; `\|` stays inside its cell as a literal pipe.
 */
export function splitTableRow(line: string): string[] {
  let content = line.trim();
  if (content.startsWith('|')) content = content.substring(1);
  if (content.endsWith('|') && !content.endsWith('\\|')) {
    content = content.substring(0, content.length - 1);
  }

  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (ch === '\\' && content[i + 1] === '|') {
      current += '|';
      i++;
    } else if (ch === '|') {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

/** Return the fence marker a line opens with, if any. */
export function matchFence(line: string): FenceMarker | null {
  const trimmed = line.trimStart();
  if (trimmed.startsWith('```')) return '```';
  if (trimmed.startsWith('~~~')) return '~~~';
  return null;
}

/** A closing fence is the bare marker, possibly longer, with no info string after it. */
export function isClosingFence(line: string, marker: FenceMarker): boolean {
  const trimmed = line.trim();
  return trimmed.length >= marker.length && [...trimmed].every((ch) => ch === marker[0]);
}

/** Match a bullet (`-`, `*`, `+`) or numbered (`1.`) list marker; the returned text excludes it. */
export function parseListMarker(line: string): { ordered: boolean; text: string } | null {
  const trimmed = line.trim();

  const bullet = trimmed.match(BULLET_PATTERN);
  if (bullet) return { ordered: false, text: bullet[1] };

  const numbered = trimmed.match(NUMBERED_PATTERN);
  if (numbered) return { ordered: true, text: numbered[1] };

  return null;
}
