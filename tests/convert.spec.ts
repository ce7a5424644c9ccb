/**
 * Tests for the file-to-file conversion flow
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { convertMarkdownFile, readMarkdownFile, writeFileAtomic } from '../src/tools/docx/convert.js';
import { DocxError, DocxErrorCode } from '../src/tools/docx/errors.js';
import { readDocxOutline } from '../src/tools/docx/structure.js';

vi.mock('../src/tools/docx/structure.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/tools/docx/structure.js')>();
  return { ...actual, readDocxOutline: vi.fn(actual.readDocxOutline) };
});

function errnoError(code: string, syscall: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: operation failed, ${syscall}`), { code, syscall });
}

const DEMO = '# Demo Document\n\nSome intro text.\n\n| Name | Age |\n|------|-----|\n| Alice | 30 |\n';

let workDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md-table-docx-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(workDir, { recursive: true, force: true });
});

async function writeInput(name: string, content: string = DEMO): Promise<string> {
  const inputPath = path.join(workDir, name);
  await fs.writeFile(inputPath, content, 'utf8');
  return inputPath;
}

describe('convertMarkdownFile', () => {
  it('writes next to the input with the extension replaced', async () => {
    const input = await writeInput('notes.md');
    const result = await convertMarkdownFile({ input });

    expect(result.inputPath).toBe(input);
    expect(result.outputPath).toBe(path.join(workDir, 'notes.docx'));

    const written = await fs.readFile(result.outputPath);
    expect(written.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(result.bytes).toBe(written.length);
  });

  it('adds .docx to an input without extension', async () => {
    const input = await writeInput('README');
    const result = await convertMarkdownFile({ input });
    expect(result.outputPath).toBe(path.join(workDir, 'README.docx'));
  });

  it('summarizes the written document', async () => {
    const input = await writeInput('notes.md');
    const result = await convertMarkdownFile({ input });
    expect(result.summary).toEqual({ headings: 1, paragraphs: 1, listItems: 0, tables: 1 });
  });

  it('writes to an explicit output path', async () => {
    const input = await writeInput('notes.md');
    const output = path.join(workDir, 'report.docx');

    const result = await convertMarkdownFile({ input, output });

    expect(result.outputPath).toBe(output);
    await expect(fs.access(output)).resolves.toBeUndefined();
  });

  it('creates a missing output directory', async () => {
    const input = await writeInput('notes.md');
    const outDir = path.join(workDir, 'out', 'nested');

    const result = await convertMarkdownFile({ input, outDir });

    expect(result.outputPath).toBe(path.join(outDir, 'notes.docx'));
    await expect(fs.access(result.outputPath)).resolves.toBeUndefined();
  });

  it('reports a missing input as INPUT_NOT_FOUND', async () => {
    const input = path.join(workDir, 'missing.md');
    await expect(convertMarkdownFile({ input })).rejects.toMatchObject({
      code: DocxErrorCode.INPUT_NOT_FOUND,
      message: `Not found: ${input}`,
    });
  });

  it('reports a directory given as input as INPUT_NOT_FOUND', async () => {
    await expect(convertMarkdownFile({ input: workDir })).rejects.toMatchObject({
      code: DocxErrorCode.INPUT_NOT_FOUND,
    });
  });

  it('refuses to overwrite an existing output and leaves it untouched', async () => {
    const input = await writeInput('notes.md');
    const output = path.join(workDir, 'notes.docx');
    await fs.writeFile(output, 'original', 'utf8');

    await expect(convertMarkdownFile({ input })).rejects.toMatchObject({
      code: DocxErrorCode.OUTPUT_EXISTS,
      context: { path: output, hint: 'Use -f/--force to overwrite.' },
    });
    expect(await fs.readFile(output, 'utf8')).toBe('original');
  });

  it('overwrites an existing output with force', async () => {
    const input = await writeInput('notes.md');
    const output = path.join(workDir, 'notes.docx');
    await fs.writeFile(output, 'original', 'utf8');

    await convertMarkdownFile({ input, force: true });

    const written = await fs.readFile(output);
    expect(written.subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('produces the same structure when converting twice', async () => {
    const input = await writeInput('notes.md');
    const first = await convertMarkdownFile({ input });
    const second = await convertMarkdownFile({ input, force: true });
    expect(second.outline).toEqual(first.outline);
  });

  it('leaves no temp files behind', async () => {
    const input = await writeInput('notes.md');
    await convertMarkdownFile({ input });
    await expect(convertMarkdownFile({ input })).rejects.toMatchObject({ code: DocxErrorCode.OUTPUT_EXISTS });

    expect((await fs.readdir(workDir)).sort()).toEqual(['notes.docx', 'notes.md']);
  });

  it('writes nothing when the rendered document cannot be read back', async () => {
    const input = await writeInput('notes.md');
    vi.mocked(readDocxOutline).mockImplementationOnce(() => {
      throw new DocxError('Invalid DOCX file: <w:body> not found', DocxErrorCode.INVALID_DOCX);
    });

    await expect(convertMarkdownFile({ input })).rejects.toMatchObject({ code: DocxErrorCode.INVALID_DOCX });
    expect(await fs.readdir(workDir)).toEqual(['notes.md']);
  });

  it('writes the output on filesystems without hard links', async () => {
    const input = await writeInput('notes.md');
    vi.spyOn(fs, 'link').mockRejectedValue(errnoError('EPERM', 'link'));

    const result = await convertMarkdownFile({ input });

    const written = await fs.readFile(result.outputPath);
    expect(written.subarray(0, 2).toString('latin1')).toBe('PK');
    expect((await fs.readdir(workDir)).sort()).toEqual(['notes.docx', 'notes.md']);
  });
});

describe('readMarkdownFile', () => {
  it('drops a leading byte order mark', async () => {
    const input = await writeInput('bom.md', '\uFEFF# Title');
    expect(await readMarkdownFile(input)).toBe('# Title');
  });
});

describe('writeFileAtomic', () => {
  it('does not replace a file that already exists', async () => {
    const target = path.join(workDir, 'taken.docx');
    await fs.writeFile(target, 'original', 'utf8');

    await expect(writeFileAtomic(target, Buffer.from('new'), { overwrite: false })).rejects.toMatchObject({
      code: DocxErrorCode.OUTPUT_EXISTS,
    });
    expect(await fs.readFile(target, 'utf8')).toBe('original');
    expect(await fs.readdir(workDir)).toEqual(['taken.docx']);
  });

  it('still refuses an existing file when hard links are unavailable', async () => {
    const target = path.join(workDir, 'taken.docx');
    await fs.writeFile(target, 'original', 'utf8');
    vi.spyOn(fs, 'link').mockRejectedValue(errnoError('ENOTSUP', 'link'));

    await expect(writeFileAtomic(target, Buffer.from('new'), { overwrite: false })).rejects.toMatchObject({
      code: DocxErrorCode.OUTPUT_EXISTS,
    });
    expect(await fs.readFile(target, 'utf8')).toBe('original');
    expect(await fs.readdir(workDir)).toEqual(['taken.docx']);
  });

  it('creates the file directly when hard links are unavailable', async () => {
    const target = path.join(workDir, 'fresh.docx');
    vi.spyOn(fs, 'link').mockRejectedValue(errnoError('EXDEV', 'link'));

    await writeFileAtomic(target, Buffer.from('new'), { overwrite: false });

    expect(await fs.readFile(target, 'utf8')).toBe('new');
    expect(await fs.readdir(workDir)).toEqual(['fresh.docx']);
  });

  it('replaces the file when overwriting', async () => {
    const target = path.join(workDir, 'taken.docx');
    await fs.writeFile(target, 'original', 'utf8');

    await writeFileAtomic(target, Buffer.from('new'), { overwrite: true });

    expect(await fs.readFile(target, 'utf8')).toBe('new');
    expect(await fs.readdir(workDir)).toEqual(['taken.docx']);
  });

  it('reports a missing directory as DOCX_WRITE_FAILED', async () => {
    const target = path.join(workDir, 'absent', 'out.docx');
    await expect(writeFileAtomic(target, Buffer.from('x'), { overwrite: false })).rejects.toMatchObject({
      code: DocxErrorCode.DOCX_WRITE_FAILED,
    });
  });
});
