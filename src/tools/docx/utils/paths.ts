/**
 * Path Utilities
 *
 * Pure functions for resolving the converter's input and output paths.
 *
 * @module docx/utils/paths
 */

import path from 'path';

import { DOCX_EXTENSION } from '../constants.js';

/** Check if a file path has a `.docx` extension. */
export function isDocxPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(DOCX_EXTENSION);
}

/** `notes/readme.md` → `notes/readme.docx`; a name without extension just gains one. */
export function replaceExtension(filePath: string, extension: string = DOCX_EXTENSION): string {
  const ext = path.extname(filePath);
  const base = ext ? filePath.slice(0, -ext.length) : filePath;
  return base + extension;
}

/**
 * Resolve where the document is written.
 *
 * - `outDir` places `<input basename>.docx` in that directory, even when
 *   `output` is also given.
 * - `output` is used as given, resolved against the working directory.
 * - Otherwise the output sits next to the input with its extension replaced.
 */
export function resolveOutputPath(
  inputPath: string,
  options: { output?: string; outDir?: string } = {},
): string {
  const absoluteInput = path.resolve(inputPath);

  if (options.outDir) {
    const name = replaceExtension(path.basename(absoluteInput));
    return path.join(path.resolve(options.outDir), name);
  }
  if (options.output) {
    return path.resolve(options.output);
  }
  return replaceExtension(absoluteInput);
}

/** Sibling temp path used for atomic writes: `.<name>.<pid>.<stamp>.tmp`. */
export function tempPathFor(outputPath: string): string {
  const dir = path.dirname(outputPath);
  const name = path.basename(outputPath);
  return path.join(dir, `.${name}.${process.pid}.${Date.now()}.tmp`);
}
