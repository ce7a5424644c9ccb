import { describe, expect, it } from 'vitest';
import path from 'path';

import { isDocxPath, replaceExtension, resolveOutputPath, tempPathFor } from '../src/tools/docx/utils/paths.js';

describe('replaceExtension', () => {
  it('swaps the last extension for .docx', () => {
    expect(replaceExtension('notes/readme.md')).toBe('notes/readme.docx');
    expect(replaceExtension('archive.tar.md')).toBe('archive.tar.docx');
  });

  it('appends .docx when there is no extension', () => {
    expect(replaceExtension('README')).toBe('README.docx');
    expect(replaceExtension('.profile')).toBe('.profile.docx');
  });
});

describe('isDocxPath', () => {
  it('ignores case', () => {
    expect(isDocxPath('Report.DOCX')).toBe(true);
    expect(isDocxPath('report.doc')).toBe(false);
  });
});

describe('resolveOutputPath', () => {
  const input = path.resolve('/data/in/notes.md');

  it('defaults to the input directory', () => {
    expect(resolveOutputPath(input)).toBe(path.resolve('/data/in/notes.docx'));
  });

  it('uses an explicit output path', () => {
    expect(resolveOutputPath(input, { output: '/data/out/report.docx' })).toBe(path.resolve('/data/out/report.docx'));
  });

  it('lets the output directory win over an explicit output', () => {
    expect(resolveOutputPath(input, { output: '/data/out/report.docx', outDir: '/data/build' })).toBe(
      path.join(path.resolve('/data/build'), 'notes.docx'),
    );
  });
});

describe('tempPathFor', () => {
  it('places a hidden temp file next to the target', () => {
    const temp = tempPathFor('/data/out/report.docx');
    expect(path.dirname(temp)).toBe('/data/out');
    expect(path.basename(temp)).toMatch(new RegExp(`^\\.report\\.docx\\.${process.pid}\\.\\d+\\.tmp$`));
  });
});
