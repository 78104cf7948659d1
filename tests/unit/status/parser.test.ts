import { describe, it, expect } from 'vitest';
import {
  parseChangedEntry,
  parsePorcelainStatus,
  parseRenamedOrCopiedEntry,
  parseUnmergedEntry,
  parseUntrackedEntry,
} from '../../../src/status/parser.js';

const HASH = 'e69de29bb2d1d6434b8b29ae775ad8c2e48c5391';

const changed = (code: string, path: string, sub = 'N...'): string =>
  `1 ${code} ${sub} 100644 100644 100644 ${HASH} ${HASH} ${path}`;

const renamed = (code: string, path: string): string =>
  `2 ${code} N... 100644 100644 100644 ${HASH} ${HASH} R100 ${path}`;

const unmerged = (code: string, path: string): string =>
  `u ${code} N... 100644 100644 100644 100644 ${HASH} ${HASH} ${HASH} ${path}`;

describe('parsePorcelainStatus', () => {
  it('should decode headers and every record type', () => {
    const output = [
      '# branch.oid ' + HASH,
      '# branch.head main',
      changed('.M', 'src/app.ts'),
      renamed('R.', 'src/new.ts'),
      'src/old.ts',
      unmerged('UU', 'src/conflict.ts'),
      '? notes.txt',
      '! build.log',
      '',
    ].join('\0');

    expect(parsePorcelainStatus(output)).toEqual([
      { kind: 'header', value: `branch.oid ${HASH}` },
      { kind: 'header', value: 'branch.head main' },
      { kind: 'entry', path: 'src/app.ts', statusCode: '.M', submoduleStatusCode: 'N...' },
      {
        kind: 'entry',
        path: 'src/new.ts',
        statusCode: 'R.',
        submoduleStatusCode: 'N...',
        oldPath: 'src/old.ts',
      },
      { kind: 'entry', path: 'src/conflict.ts', statusCode: 'UU', submoduleStatusCode: 'N...' },
      { kind: 'entry', path: 'notes.txt', statusCode: '??', submoduleStatusCode: '????' },
    ]);
  });

  it('should keep spaces in paths', () => {
    const [entry] = parsePorcelainStatus(changed('M.', 'docs/release notes.md') + '\0');
    expect(entry).toEqual({
      kind: 'entry',
      path: 'docs/release notes.md',
      statusCode: 'M.',
      submoduleStatusCode: 'N...',
    });
  });

  it('should consume the original path after a malformed rename record', () => {
    const output = ['2 R. broken', 'src/old.ts', '? a.txt', ''].join('\0');
    expect(parsePorcelainStatus(output)).toEqual([
      { kind: 'entry', path: 'a.txt', statusCode: '??', submoduleStatusCode: '????' },
    ]);
  });

  it('should drop a rename record with no original path', () => {
    expect(parsePorcelainStatus(renamed('R.', 'src/new.ts'))).toEqual([]);
  });

  it('should drop unknown and malformed records', () => {
    const output = ['x something', '1 .M nonsense', 'u UU short', ''].join('\0');
    expect(parsePorcelainStatus(output)).toEqual([]);
  });

  it('should return nothing for empty output', () => {
    expect(parsePorcelainStatus('')).toEqual([]);
  });
});

describe('record parsers', () => {
  it('should read submodule codes from changed records', () => {
    expect(parseChangedEntry(changed('.M', 'vendor/lib', 'SC.U'))).toEqual({
      kind: 'entry',
      path: 'vendor/lib',
      statusCode: '.M',
      submoduleStatusCode: 'SC.U',
    });
  });

  it('should reject an invalid submodule code', () => {
    expect(parseChangedEntry(changed('.M', 'vendor/lib', 'SXYZ'))).toBeNull();
  });

  it('should attach the original path to copies', () => {
    const token = `2 C. N... 100644 100644 100644 ${HASH} ${HASH} C75 src/copy.ts`;
    expect(parseRenamedOrCopiedEntry(token, 'src/source.ts')).toEqual({
      kind: 'entry',
      path: 'src/copy.ts',
      statusCode: 'C.',
      submoduleStatusCode: 'N...',
      oldPath: 'src/source.ts',
    });
  });

  it('should only accept D, A and U in unmerged codes', () => {
    expect(parseUnmergedEntry(unmerged('AA', 'a.ts'))?.statusCode).toBe('AA');
    expect(parseUnmergedEntry(unmerged('MM', 'a.ts'))).toBeNull();
  });

  it('should assign fixed codes to untracked records', () => {
    expect(parseUntrackedEntry('? dir/file name.txt')).toEqual({
      kind: 'entry',
      path: 'dir/file name.txt',
      statusCode: '??',
      submoduleStatusCode: '????',
    });
  });
});
