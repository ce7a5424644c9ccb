/**
 * Document model builder — groups segmented blocks into renderable elements.
 *
 * Pure and synchronous: no docx objects are created here, so the element
 * sequence can be inspected (and tested) before anything is serialised.
 */

import type {
    ContentBlock,
    DocumentElement,
    DocumentElementType,
    ListEntry,
    MarkdownDocument,
    TableRowBlock,
} from '../types.js';
import { TABLE_STYLE } from '../constants.js';

/** Pad with empty strings or drop trailing cells so the row has exactly `columnCount` cells. */
export function conformRow(cells: readonly string[], columnCount: number): string[] {
    const row = cells.slice(0, columnCount);
    while (row.length < columnCount) row.push('');
    return row;
}

function buildTableElement(header: TableRowBlock, body: TableRowBlock[]): DocumentElement {
    const columnCount = header.cells.length;
    return {
        type: 'table',
        header: [...header.cells],
        rows: body.map((row) => conformRow(row.cells, columnCount)),
        style: TABLE_STYLE,
    };
}

export function buildDocument(blocks: readonly ContentBlock[]): MarkdownDocument {
    const elements: DocumentElement[] = [];

    let i = 0;
    while (i < blocks.length) {
        const block = blocks[i];

        switch (block.type) {
            case 'heading':
                elements.push({ type: 'heading', level: block.level, text: block.text });
                i++;
                break;

            case 'paragraph':
                elements.push({ type: 'paragraph', text: block.text });
                i++;
                break;

            case 'listItem': {
                const items: ListEntry[] = [{ ordered: block.ordered, text: block.text }];
                i++;
                while (i < blocks.length) {
                    const next = blocks[i];
                    if (next.type !== 'listItem' || next.startsRun) break;
                    items.push({ ordered: next.ordered, text: next.text });
                    i++;
                }
                elements.push({ type: 'list', items });
                break;
            }

            case 'codeLine': {
                const lines = [block.text];
                i++;
                while (i < blocks.length) {
                    const next = blocks[i];
                    if (next.type !== 'codeLine' || next.startsRun) break;
                    lines.push(next.text);
                    i++;
                }
                elements.push({ type: 'code', lines });
                break;
            }

            case 'tableRow': {
                const body: TableRowBlock[] = [];
                i++;
                while (i < blocks.length) {
                    const next = blocks[i];
                    if (next.type !== 'tableRow' || next.isHeader) break;
                    body.push(next);
                    i++;
                }
                // The first row of a run is its header, separator row or not.
                elements.push(buildTableElement(block, body));
                break;
            }
        }
    }

    return { elements };
}

export function countElements(document: MarkdownDocument, type: DocumentElementType): number {
    return document.elements.filter((element) => element.type === type).length;
}
