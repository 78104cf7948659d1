import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { buildClassification } from '../../../src/cli/commands/classify.js';
import { assertOutputSize, buildStatusArgs } from '../../../src/cli/commands/status.js';
import { replayProgress } from '../../../src/cli/commands/progress.js';
import { buildLoggedPatch, buildPatch, parsePatchRequest } from '../../../src/cli/commands/patch.js';
import { CLIError, ExitCode, InvalidArgumentError, NothingToDoError } from '../../../src/cli/errors.js';
import { GitErrorKind } from '../../../src/errors/types.js';
import { modifiedFileDiff } from '../diff/helpers.js';

describe('classify command', () => {
  it('should collect oversized files for GH001 rejections', () => {
    const text = [
      'remote: error: GH001: Large files detected.',
      "remote: error: File assets/video.mov is 120.00 MB; this exceeds GitHub's file size limit of 100.00 MB",
    ].join('\n');

    const result = buildClassification(text);
    expect(result.kind).toBe(GitErrorKind.PushWithFileSizeExceedingLimit);
    expect(result.oversizedFiles).toEqual(['assets/video.mov (120.00 MB)']);
  });

  it('should leave the description empty for undescribed kinds', () => {
    expect(buildClassification("fatal: tag 'v1' already exists")).toEqual({
      kind: GitErrorKind.TagAlreadyExists,
      description: null,
      oversizedFiles: [],
    });
  });

  it('should report unrecognised output', () => {
    expect(buildClassification('Everything up-to-date')).toEqual({
      kind: null,
      description: null,
      oversizedFiles: [],
    });
  });
});

describe('status command', () => {
  it('should request NUL-separated porcelain v2 output with branch headers', () => {
    expect(buildStatusArgs('normal')).toEqual([
      '--no-optional-locks',
      'status',
      '--untracked-files=normal',
      '--branch',
      '--porcelain=2',
      '-z',
    ]);
  });

  it('should reject output over the size limit', () => {
    const config = { maxOutputBytes: 4, untrackedFiles: 'all' as const };

    expect(() => assertOutputSize('1234', config)).not.toThrow();
    try {
      assertOutputSize('12345', config);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CLIError);
      expect(error instanceof CLIError && error.exitCode).toBe(ExitCode.INVALID_ARGS);
      expect(error instanceof CLIError && error.guidance?.hint).toBe('Read 5 bytes, limit is 4');
    }
  });

  it('should count bytes rather than characters', () => {
    const config = { maxOutputBytes: 4, untrackedFiles: 'all' as const };
    expect(() => assertOutputSize('ééé', config)).toThrow(CLIError);
  });
});

describe('progress command', () => {
  it('should replay git stderr through a preset', () => {
    const events = replayProgress(
      ["Cloning into 'app'...", 'Receiving objects:  50% (50/100)', 'Resolving deltas: 100% (4/4), done.'],
      { preset: 'clone', lfs: false, trackLfs: true }
    );

    expect(events.map((e) => [e.kind, e.percent])).toEqual([
      ['context', 0],
      ['progress', 40],
      ['progress', 80],
    ]);
  });

  it('should replay LFS progress lines', () => {
    const events = replayProgress(['download 1/2 25/100 a.bin', 'Git LFS: (1 of 2 files)'], {
      preset: 'fetch',
      lfs: true,
      trackLfs: true,
    });

    expect(events).toHaveLength(1);
    expect(events[0]?.percent).toBe(25);
  });

  it('should reject unknown presets', () => {
    expect(() => replayProgress([], { preset: 'merge', lfs: false, trackLfs: true })).toThrow(
      'Unknown progress preset: merge'
    );
  });

  it('should refuse LFS input when tracking is disabled', () => {
    expect(() => replayProgress([], { preset: 'clone', lfs: true, trackLfs: false })).toThrow(
      InvalidArgumentError
    );
  });
});

describe('patch command', () => {
  const request = (selectedLines: number[], extra: Record<string, unknown> = {}): string =>
    JSON.stringify({ path: 'src/app.ts', diff: modifiedFileDiff(), selectedLines, ...extra });

  it('should stage the selected lines', () => {
    expect(buildPatch(parsePatchRequest(request([9])), 'stage')).toBe(
      '--- a/src/app.ts\n+++ b/src/app.ts\n@@ -10,2 +11 @@\n line ten\n-line eleven\n'
    );
  });

  it('should discard the selected lines', () => {
    expect(buildPatch(parsePatchRequest(request([9])), 'discard')).toBe(
      '--- a/src/app.ts\n+++ b/src/app.ts\n@@ -11 +11,2 @@\n line ten\n+line eleven\n'
    );
  });

  it('should default the status to modified and the selection to nothing', () => {
    const parsed = parsePatchRequest(JSON.stringify({ path: 'a.txt', diff: { hunks: [] } }));
    expect(parsed.status).toBe('modified');
    expect(parsed.selectedLines).toEqual([]);
  });

  it('should report an empty selection as nothing to do', () => {
    expect(() => buildPatch(parsePatchRequest(request([])), 'stage')).toThrow(
      new NothingToDoError('Could not generate a patch, no changes for file src/app.ts')
    );
    expect(() => buildPatch(parsePatchRequest(request([])), 'discard')).toThrow(
      'No selected changes to discard in src/app.ts'
    );
  });

  it('should stage new files against /dev/null', () => {
    const patch = buildPatch(parsePatchRequest(request([4], { status: 'new' })), 'stage');
    expect(patch.startsWith('--- /dev/null\n+++ b/src/app.ts\n')).toBe(true);
  });

  it('should log the build under the patch component', () => {
    const entries: Array<Record<string, unknown>> = [];
    const logger = pino(
      { level: 'debug', base: null, timestamp: false },
      {
        write(line: string): void {
          const parsed: unknown = JSON.parse(line);
          if (typeof parsed === 'object' && parsed !== null) {
            entries.push(Object.fromEntries(Object.entries(parsed)));
          }
        },
      }
    );

    const patch = buildLoggedPatch(parsePatchRequest(request([9])), 'stage', logger);

    expect(patch).toBe('--- a/src/app.ts\n+++ b/src/app.ts\n@@ -10,2 +11 @@\n line ten\n-line eleven\n');
    expect(entries.map((e) => e.msg)).toEqual([
      'Starting buildPatch',
      expect.stringMatching(/^Completed buildPatch in \d+ms$/),
    ]);
    expect(entries[0]).toMatchObject({
      component: 'patch',
      operation: 'buildPatch',
      path: 'src/app.ts',
      mode: 'stage',
    });
  });

  it('should reject malformed requests', () => {
    expect(() => parsePatchRequest('{')).toThrow(InvalidArgumentError);
    expect(() => parsePatchRequest(JSON.stringify({ path: '', diff: { hunks: [] } }))).toThrow(
      /^Invalid patch request: path: /
    );
    expect(() =>
      parsePatchRequest(JSON.stringify({ path: 'a', diff: { hunks: [] }, selectedLines: [-1] }))
    ).toThrow(InvalidArgumentError);
  });
});
