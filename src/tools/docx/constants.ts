/**
 * DOCX constants — fixed styling shared by the renderer and its tests.
 */

import type { TableStyle } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// Fonts (sizes in half-points, as Word stores them)
// ═══════════════════════════════════════════════════════════════════════

export const BODY_FONT = 'Calibri';
export const BODY_FONT_SIZE = 22;

export const CODE_FONT = 'Consolas';
export const CODE_FONT_SIZE = 21;

// ═══════════════════════════════════════════════════════════════════════
// Tables
// ═══════════════════════════════════════════════════════════════════════

export const TABLE_STYLE: TableStyle = {
    border: 'grid',
    headerBold: true,
    headerCentered: true,
    rowSpacing: 'compact',
};

/** Single-line border, 1/2 pt, black. */
export const GRID_BORDER = {
    size: 4,
    space: 0,
    color: '000000',
} as const;

/** Paragraph spacing inside table cells, in twips (240 = single line). */
export const COMPACT_SPACING = {
    before: 0,
    after: 0,
    line: 240,
} as const;

/** Usable text width of a default Letter/A4 page, in twips. */
export const TABLE_TOTAL_WIDTH = 9000;

// ═══════════════════════════════════════════════════════════════════════
// Lists
// ═══════════════════════════════════════════════════════════════════════

export const ORDERED_LIST_REFERENCE = 'markdown-ordered-list';

export const LIST_INDENT = {
    left: 720,
    hanging: 360,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_EXTENSION = '.docx';

export const DOCX_PATHS = {
    DOCUMENT_XML: 'word/document.xml',
} as const;
