/**
 * DOM utilities for reading DOCX XML.
 *
 * Single Responsibility: XML parsing and navigation. No file I/O — every
 * function works on in-memory DOM nodes.
 *
 * Uses @xmldom/xmldom for parsing so that the document-order of nodes is
 * always preserved.
 */

import { DOMParser } from '@xmldom/xmldom';

// ═══════════════════════════════════════════════════════════════════════
// XML parse
// ═══════════════════════════════════════════════════════════════════════

export function parseXml(xmlStr: string): Document {
    return new DOMParser().parseFromString(xmlStr, 'application/xml');
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

export function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

/** Direct element children in document order. */
export function childElements(node: Node): Element[] {
    const out: Element[] = [];
    for (let i = 0; i < node.childNodes.length; i++) {
        const child = node.childNodes.item(i);
        if (child && isElement(child)) out.push(child);
    }
    return out;
}

export function findDirectChild(node: Node, name: string): Element | null {
    return childElements(node).find((child) => child.nodeName === name) ?? null;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element | null {
    return doc.getElementsByTagName('w:body').item(0);
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraph helpers
// ═══════════════════════════════════════════════════════════════════════

/** Run text in order; <w:br/> becomes a newline and <w:tab/> a tab. */
export function getRunText(r: Element): string {
    let out = '';
    for (const child of childElements(r)) {
        if (child.nodeName === 'w:t') out += child.textContent ?? '';
        else if (child.nodeName === 'w:br') out += '\n';
        else if (child.nodeName === 'w:tab') out += '\t';
    }
    return out;
}

export function getRuns(p: Element): Element[] {
    return childElements(p).filter((child) => child.nodeName === 'w:r');
}

export function getParagraphText(p: Element): string {
    return getRuns(p).map(getRunText).join('');
}

/** Read w:pPr/<name>/@w:val, or null if absent. */
function getParagraphProperty(p: Element, name: string): string | null {
    const pPr = findDirectChild(p, 'w:pPr');
    const prop = pPr ? findDirectChild(pPr, name) : null;
    return prop?.getAttribute('w:val') ?? null;
}

export function getParagraphStyle(p: Element): string | null {
    return getParagraphProperty(p, 'w:pStyle');
}

export function getParagraphAlignment(p: Element): string | null {
    return getParagraphProperty(p, 'w:jc');
}

/** w:pPr/w:numPr, if the paragraph belongs to a numbered or bulleted list. */
export function getParagraphNumbering(p: Element): { numId: string; level: number } | null {
    const pPr = findDirectChild(p, 'w:pPr');
    const numPr = pPr ? findDirectChild(pPr, 'w:numPr') : null;
    if (!numPr) return null;

    const numId = findDirectChild(numPr, 'w:numId')?.getAttribute('w:val');
    if (!numId) return null;

    const level = Number(findDirectChild(numPr, 'w:ilvl')?.getAttribute('w:val') ?? '0');
    return { numId, level: Number.isNaN(level) ? 0 : level };
}

export function isRunBold(r: Element): boolean {
    const rPr = findDirectChild(r, 'w:rPr');
    const b = rPr ? findDirectChild(rPr, 'w:b') : null;
    if (!b) return false;
    const val = b.getAttribute('w:val');
    return val !== 'false' && val !== '0';
}
