/**
 * Table builder — renders a table element as a native Word table with a
 * grid border, a bold centered header row and compact row spacing.
 */

import {
    AlignmentType,
    BorderStyle,
    Paragraph,
    Table,
    TableCell,
    TableRow,
    TextRun,
    VerticalAlign,
    WidthType,
} from 'docx';

import type { DocumentElement, TableStyle } from '../types.js';
import { COMPACT_SPACING, GRID_BORDER, TABLE_TOTAL_WIDTH } from '../constants.js';

type TableElement = Extract<DocumentElement, { type: 'table' }>;

const GRID_SIDE = { style: BorderStyle.SINGLE, ...GRID_BORDER };

function buildBorders(style: TableStyle) {
    if (style.border !== 'grid') return undefined;
    return {
        top: GRID_SIDE,
        bottom: GRID_SIDE,
        left: GRID_SIDE,
        right: GRID_SIDE,
        insideHorizontal: GRID_SIDE,
        insideVertical: GRID_SIDE,
    };
}

function buildCell(text: string, isHeader: boolean, style: TableStyle, widthTwips: number): TableCell {
    const bold = isHeader && style.headerBold;
    const centered = isHeader && style.headerCentered;

    return new TableCell({
        width: { size: widthTwips, type: WidthType.DXA },
        verticalAlign: VerticalAlign.CENTER,
        children: [
            new Paragraph({
                alignment: centered ? AlignmentType.CENTER : AlignmentType.LEFT,
                spacing: style.rowSpacing === 'compact' ? COMPACT_SPACING : undefined,
                children: [new TextRun({ text, bold })],
            }),
        ],
    });
}

/**
 * Build a table from a document table element.
 * Column count comes from the header; body rows are already conformed to it.
 */
export function buildTable(element: TableElement): Table {
    const { header, rows, style } = element;
    const columnWidth = Math.floor(TABLE_TOTAL_WIDTH / header.length);

    const headerRow = new TableRow({
        tableHeader: true,
        children: header.map((cell) => buildCell(cell, true, style, columnWidth)),
    });

    const bodyRows = rows.map(
        (row) =>
            new TableRow({
                children: row.map((cell) => buildCell(cell, false, style, columnWidth)),
            }),
    );

    return new Table({
        width: { size: 100, type: WidthType.PERCENTAGE },
        columnWidths: header.map(() => columnWidth),
        alignment: AlignmentType.LEFT,
        borders: buildBorders(style),
        rows: [headerRow, ...bodyRows],
    });
}
