import { describe, it, expect } from 'vitest';
import { LfsProgressParser } from '../../../src/progress/lfs.js';

describe('LfsProgressParser', () => {
  it('should report a single file transfer', () => {
    const parser = new LfsProgressParser();

    expect(parser.parse('download 1/3 1024/4096 assets/logo.png')).toEqual({
      kind: 'progress',
      percent: 25,
      details: {
        title: 'Downloading "assets/logo.png"',
        value: 1024,
        total: 4096,
        percent: 25,
        done: false,
        text: 'Downloading assets/logo.png (0 out of an estimated 3 completed, 1024 / 4096)',
      },
    });
  });

  it('should aggregate files and count finished ones', () => {
    const parser = new LfsProgressParser();
    parser.parse('download 1/3 1024/4096 assets/logo.png');

    const finished = parser.parse('download 1/3 4096/4096 assets/logo.png');
    expect(finished.percent).toBe(100);
    expect(finished.kind === 'progress' && finished.details.text).toBe(
      'Downloading assets/logo.png (1 out of an estimated 3 completed, 4096 / 4096)'
    );

    const second = parser.parse('download 2/3 1000/3000 assets/b.bin');
    expect(second.percent).toBe(71);
    expect(second.kind === 'progress' && second.details.done).toBe(false);
  });

  it('should be done when every estimated file has finished', () => {
    const parser = new LfsProgressParser();
    const result = parser.parse('checkout 1/1 10/10 a.bin');

    expect(result.kind === 'progress' && result.details.done).toBe(true);
    expect(result.kind === 'progress' && result.details.title).toBe('Checking out "a.bin"');
  });

  it('should name the direction', () => {
    const parser = new LfsProgressParser();
    const upload = parser.parse('upload 1/2 1/2 a.bin');
    const unknown = parser.parse('sync 1/2 1/2 b.bin');

    expect(upload.kind === 'progress' && upload.details.title).toBe('Uploading "a.bin"');
    expect(unknown.kind === 'progress' && unknown.details.title).toBe('Downloading "b.bin"');
  });

  it('should treat other lines as context', () => {
    const parser = new LfsProgressParser();
    expect(parser.parse('Git LFS: (1 of 3 files)')).toEqual({
      kind: 'context',
      percent: 0,
      text: 'Git LFS: (1 of 3 files)',
    });
  });
});
