/**
 * convertMarkdownFile — the file-to-file conversion orchestrator.
 *
 * Single Responsibility: coordinate the conversion pipeline:
 *   1. Resolve and check the input file
 *   2. Resolve the output path (creating --out-dir if needed)
 *   3. Refuse an existing output unless forced
 *   4. Read Markdown → segment → build → render into memory
 *   5. Read the rendered buffer back for a summary
 *   6. Write atomically (temp file, then link or rename into place)
 *
 * Segmenting, building and rendering happen entirely in memory, so nothing
 * reaches the output path unless the whole document was produced.
 */

import fs from 'fs/promises';
import path from 'path';

import type { ConversionResult, ConvertOptions } from './types.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { createDocxFromMarkdown } from './builders/markdown-builder.js';
import { readDocxOutline, summarizeOutline } from './structure.js';
import { isDocxPath, resolveOutputPath, tempPathFor } from './utils/paths.js';
import { errorMessage, isErrnoException } from '../../utils/type-guards.js';
import { logger } from '../../utils/logger.js';

async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

async function assertInputFile(inputPath: string): Promise<void> {
    try {
        const stats = await fs.stat(inputPath);
        if (stats.isFile()) return;
    } catch (error) {
        if (!isErrnoException(error) || (error.code !== 'ENOENT' && error.code !== 'ENOTDIR')) {
            throw new DocxError(`Cannot access input: ${inputPath}`, DocxErrorCode.INPUT_NOT_FOUND, {
                path: inputPath,
                reason: errorMessage(error),
            });
        }
    }
    throw new DocxError(`Not found: ${inputPath}`, DocxErrorCode.INPUT_NOT_FOUND, { path: inputPath });
}

function outputExists(outputPath: string): DocxError {
    return new DocxError(
        `Refusing to overwrite existing file: ${outputPath}`,
        DocxErrorCode.OUTPUT_EXISTS,
        { path: outputPath, hint: 'Use -f/--force to overwrite.' },
    );
}

export async function readMarkdownFile(inputPath: string): Promise<string> {
    try {
        const text = await fs.readFile(inputPath, 'utf8');
        return text.startsWith('\uFEFF') ? text.slice(1) : text;
    } catch (error) {
        throw new DocxError(`Cannot read input: ${inputPath}`, DocxErrorCode.INPUT_NOT_FOUND, {
            path: inputPath,
            reason: errorMessage(error),
        });
    }
}

function isAlreadyExists(error: unknown): boolean {
    return isErrnoException(error) && error.code === 'EEXIST';
}

/**
 * Put the temp file in place without replacing anything. Filesystems without
 * hard links (FAT, exFAT, some network mounts) get an exclusive create of the
 * target instead; a partial target from a failed create is removed.
 */
async function linkIntoPlace(tempPath: string, outputPath: string, data: Buffer): Promise<void> {
    try {
        await fs.link(tempPath, outputPath);
        return;
    } catch (error) {
        if (isAlreadyExists(error)) throw outputExists(outputPath);
        logger.debug(`Cannot hard link ${outputPath} (${errorMessage(error)}); creating it directly`);
    }

    try {
        await fs.writeFile(outputPath, data, { flag: 'wx' });
    } catch (error) {
        if (isAlreadyExists(error)) throw outputExists(outputPath);
        await fs.rm(outputPath, { force: true });
        throw error;
    }
}

/**
 * Write `data` to a sibling temp file and move it into place.
 * Without `overwrite` the move never replaces a file that appeared in the
 * meantime: that case fails with OUTPUT_EXISTS.
 */
export async function writeFileAtomic(
    outputPath: string,
    data: Buffer,
    options: { overwrite: boolean },
): Promise<void> {
    const tempPath = tempPathFor(outputPath);
    try {
        await fs.writeFile(tempPath, data, { flag: 'wx' });
        if (options.overwrite) {
            await fs.rename(tempPath, outputPath);
        } else {
            await linkIntoPlace(tempPath, outputPath, data);
        }
    } catch (error) {
        if (error instanceof DocxError) throw error;
        throw new DocxError(`Failed to write ${outputPath}: ${errorMessage(error)}`, DocxErrorCode.DOCX_WRITE_FAILED, {
            path: outputPath,
        });
    } finally {
        await fs.rm(tempPath, { force: true });
    }
}

export async function convertMarkdownFile(options: ConvertOptions): Promise<ConversionResult> {
    const force = options.force ?? false;

    // 1. Input
    const inputPath = path.resolve(options.input);
    await assertInputFile(inputPath);

    // 2. Output location
    const outputPath = resolveOutputPath(inputPath, options);
    if (options.outDir && options.output) {
        logger.warning(`Ignoring -o ${options.output}: --out-dir takes precedence`);
    }
    if (!isDocxPath(outputPath)) {
        logger.warning(`Output does not end in .docx: ${outputPath}`);
    }
    if (options.outDir) {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
    }
    logger.debug(`Resolved output path: ${outputPath}`);

    // 3. Overwrite protection, before any conversion work
    if (!force && (await pathExists(outputPath))) {
        throw outputExists(outputPath);
    }

    // 4. Convert in memory
    const markdown = await readMarkdownFile(inputPath);
    const buffer = await createDocxFromMarkdown(markdown);
    logger.debug(`Rendered ${buffer.length} bytes from ${markdown.length} characters of Markdown`);

    // 5. Outline, from the in-memory buffer so a failed read-back writes nothing
    const outline = readDocxOutline(buffer);

    // 6. Write
    await writeFileAtomic(outputPath, buffer, { overwrite: force });

    return { inputPath, outputPath, bytes: buffer.length, outline, summary: summarizeOutline(outline) };
}
