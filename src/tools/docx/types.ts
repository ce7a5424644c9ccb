/**
 * Type definitions for Markdown → DOCX conversion.
 * Single source of truth for every type used across the DOCX module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Markdown blocks (segmenter output)
// ═══════════════════════════════════════════════════════════════════════

export type HeadingLevelNumber = 1 | 2 | 3;

export interface HeadingBlock {
    type: 'heading';
    level: HeadingLevelNumber;
    text: string;
}

export interface ParagraphBlock {
    type: 'paragraph';
    text: string;
}

export interface ListItemBlock {
    type: 'listItem';
    ordered: boolean;
    text: string;
    /** First item of a visual list (after a non-list block or a terminating blank line). */
    startsRun: boolean;
}

export interface CodeLineBlock {
    type: 'codeLine';
    text: string;
    /** First line after an opening fence. */
    startsRun: boolean;
}

export interface TableRowBlock {
    type: 'tableRow';
    cells: string[];
    isHeader: boolean;
}

export interface BlankBlock {
    type: 'blank';
}

export type MarkdownBlock =
    | HeadingBlock
    | ParagraphBlock
    | ListItemBlock
    | CodeLineBlock
    | TableRowBlock
    | BlankBlock;

/** Blocks handed to the document builder; blank lines never reach it. */
export type ContentBlock = Exclude<MarkdownBlock, BlankBlock>;

// ═══════════════════════════════════════════════════════════════════════
// Document model (builder output)
// ═══════════════════════════════════════════════════════════════════════

export interface TableStyle {
    readonly border: 'grid';
    readonly headerBold: true;
    readonly headerCentered: true;
    readonly rowSpacing: 'compact';
}

export interface ListEntry {
    ordered: boolean;
    text: string;
}

export type DocumentElement =
    | { type: 'heading'; level: HeadingLevelNumber; text: string }
    | { type: 'paragraph'; text: string }
    | { type: 'list'; items: ListEntry[] }
    | { type: 'code'; lines: string[] }
    | { type: 'table'; header: string[]; rows: string[][]; style: TableStyle };

export type DocumentElementType = DocumentElement['type'];

export interface MarkdownDocument {
    readonly elements: readonly DocumentElement[];
}

// ═══════════════════════════════════════════════════════════════════════
// Read-back outline (used for summaries and verification)
// ═══════════════════════════════════════════════════════════════════════

export interface OutlineCell {
    text: string;
    bold: boolean;
    alignment: string | null;
}

export interface ParagraphOutline {
    kind: 'paragraph';
    bodyChildIndex: number;
    style: string | null;
    text: string;
    /** Set for list paragraphs (bulleted or numbered). */
    numbering: { numId: string; level: number } | null;
}

export interface TableOutline {
    kind: 'table';
    bodyChildIndex: number;
    rows: OutlineCell[][];
}

export type OutlineElement = ParagraphOutline | TableOutline;

export interface DocxOutline {
    elements: OutlineElement[];
}

export interface OutlineSummary {
    headings: number;
    paragraphs: number;
    listItems: number;
    tables: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Conversion
// ═══════════════════════════════════════════════════════════════════════

export interface ConvertOptions {
    input: string;
    output?: string;
    outDir?: string;
    force?: boolean;
}

export interface ConversionResult {
    inputPath: string;
    outputPath: string;
    bytes: number;
    outline: DocxOutline;
    summary: OutlineSummary;
}
