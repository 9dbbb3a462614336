import { describe, expect, it } from 'vitest';

import { firstFileList, normalizeFileRefs, resolveFileLink } from './fileRefs.js';

describe('normalizeFileRefs', () => {
  it('decodes a JSON list and synthesizes a Drive link from fileId', () => {
    const refs = normalizeFileRefs('[{"name":"a.pdf","fileId":"XYZ"}]');
    expect(refs).toHaveLength(1);
    expect(refs[0]?.name).toBe('a.pdf');
    expect(resolveFileLink(refs[0] ?? { name: '' })).toEqual({
      kind: 'synthesized',
      url: 'https://drive.google.com/uc?export=download&id=XYZ',
    });
  });

  it('wraps a single JSON object', () => {
    const refs = normalizeFileRefs('  {"name":"quote.xlsx","viewUrl":"https://example.test/v/1"} ');
    expect(refs.map((r) => r.name)).toEqual(['quote.xlsx']);
  });

  it('returns an empty list for garbage without throwing', () => {
    expect(normalizeFileRefs('not json')).toEqual([]);
    expect(normalizeFileRefs(null)).toEqual([]);
    expect(normalizeFileRefs(undefined)).toEqual([]);
    expect(normalizeFileRefs('')).toEqual([]);
    expect(normalizeFileRefs('[{"name": broken')).toEqual([]);
    expect(normalizeFileRefs('"a.pdf"')).toEqual([]);
    expect(normalizeFileRefs(42)).toEqual([]);
  });

  it('keeps list order and drops entries without a name', () => {
    const refs = normalizeFileRefs([{ name: 'one.pdf' }, { fileId: 'no-name' }, 'two.pdf', { name: 'three.pdf', id: 7 }]);
    expect(refs.map((r) => r.name)).toEqual(['one.pdf', 'three.pdf']);
  });
});

describe('resolveFileLink', () => {
  it('prefers downloadUrl, then viewUrl', () => {
    expect(resolveFileLink({ name: 'a', downloadUrl: 'https://d.test/a', viewUrl: 'https://v.test/a', fileId: 'F' })).toEqual({
      kind: 'explicit',
      url: 'https://d.test/a',
    });
    expect(resolveFileLink({ name: 'a', viewUrl: 'https://v.test/a', fileId: 'F' })).toEqual({
      kind: 'explicit',
      url: 'https://v.test/a',
    });
  });

  it('falls back to id and finally to no link', () => {
    expect(resolveFileLink({ name: 'a', id: 12 }).url).toBe('https://drive.google.com/uc?export=download&id=12');
    expect(resolveFileLink({ name: 'a', fileId: '  ' })).toEqual({ kind: 'none', url: null });
    expect(resolveFileLink({ name: 'a' })).toEqual({ kind: 'none', url: null });
  });

  it('skips a blank fileId and uses id', () => {
    const refs = normalizeFileRefs('[{"name":"a.pdf","fileId":"","id":"XYZ"}]');
    expect(resolveFileLink(refs[0] ?? { name: '' })).toEqual({
      kind: 'synthesized',
      url: 'https://drive.google.com/uc?export=download&id=XYZ',
    });
  });

  it('ignores a whitespace-only downloadUrl', () => {
    expect(resolveFileLink({ name: 'a', downloadUrl: '  ', viewUrl: 'https://v.test/a' })).toEqual({
      kind: 'explicit',
      url: 'https://v.test/a',
    });
  });
});

describe('firstFileList', () => {
  it('takes the first candidate that yields files', () => {
    const files = firstFileList('', null, '[{"name":"late.pdf"}]', [{ name: 'ignored.pdf' }]);
    expect(files.map((f) => f.name)).toEqual(['late.pdf']);
  });

  it('returns an empty list when no candidate has files', () => {
    expect(firstFileList(undefined, 'Done', '[]')).toEqual([]);
  });
});
