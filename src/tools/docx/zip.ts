/**
 * DOCX ZIP access — buffer ↔ zip ↔ xml.
 */

import PizZip from 'pizzip';

import { DOCX_PATHS } from './constants.js';
import { DocxError, DocxErrorCode } from './errors.js';

export function loadDocxZip(buffer: Buffer): PizZip {
    try {
        return new PizZip(buffer);
    } catch (error) {
        throw new DocxError(
            `Invalid DOCX: ${error instanceof Error ? error.message : String(error)}`,
            DocxErrorCode.INVALID_DOCX,
            { bufferSize: buffer.length },
        );
    }
}

/**
 * Extract the raw XML string from word/document.xml inside the zip.
 * Throws if the entry is missing.
 */
export function getDocumentXml(zip: PizZip): string {
    const entry = zip.file(DOCX_PATHS.DOCUMENT_XML);
    if (!entry) {
        throw new DocxError(
            `Invalid DOCX: missing ${DOCX_PATHS.DOCUMENT_XML}`,
            DocxErrorCode.INVALID_DOCX,
        );
    }
    return entry.asText();
}
