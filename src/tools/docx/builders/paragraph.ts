/**
 * Paragraph builders — headings, body text, list items and code blocks.
 */

import { HeadingLevel, Paragraph, TextRun } from 'docx';

import type { HeadingLevelNumber, ListEntry } from '../types.js';
import { CODE_FONT, CODE_FONT_SIZE, ORDERED_LIST_REFERENCE } from '../constants.js';

const HEADING_STYLES = {
    1: HeadingLevel.HEADING_1,
    2: HeadingLevel.HEADING_2,
    3: HeadingLevel.HEADING_3,
} as const;

export function buildHeading(level: HeadingLevelNumber, text: string): Paragraph {
    return new Paragraph({
        heading: HEADING_STYLES[level],
        children: [new TextRun(text)],
    });
}

/** Text is passed through literally; `**` and `_` markers are not interpreted. */
export function buildParagraph(text: string): Paragraph {
    return new Paragraph({ children: [new TextRun(text)] });
}

/**
 * One paragraph per list item. Ordered items share a numbering instance
 * per list so every list restarts at 1.
 */
export function buildListParagraphs(items: readonly ListEntry[], instance: number): Paragraph[] {
    return items.map((item) =>
        item.ordered
            ? new Paragraph({
                numbering: { reference: ORDERED_LIST_REFERENCE, level: 0, instance },
                children: [new TextRun(item.text)],
            })
            : new Paragraph({
                bullet: { level: 0 },
                children: [new TextRun(item.text)],
            }),
    );
}

/** A single monospace paragraph; source lines become line breaks. */
export function buildCodeBlock(lines: readonly string[]): Paragraph {
    return new Paragraph({
        children: lines.map(
            (line, index) =>
                new TextRun({
                    text: line,
                    font: CODE_FONT,
                    size: CODE_FONT_SIZE,
                    break: index > 0 ? 1 : undefined,
                }),
        ),
    });
}
