import { describe, it, expect } from 'vitest';
import { GitCommandError, checkGitResult } from '../../../src/errors/command-error.js';
import { GitErrorKind, GitReadoutError, ReadoutErrorCode } from '../../../src/errors/types.js';

describe('GitCommandError', () => {
  it('should use the description of a classified failure as its message', () => {
    const error = new GitCommandError(
      { stdout: '', stderr: 'fatal: bad revision \'nope\'', exitCode: 128 },
      ['log', 'nope']
    );

    expect(error).toBeInstanceOf(GitReadoutError);
    expect(error.code).toBe(ReadoutErrorCode.COMMAND_FAILED);
    expect(error.kind).toBe(GitErrorKind.BadRevision);
    expect(error.message).toBe('Bad revision.');
    expect(error.isRawMessage).toBe(false);
    expect(error.command).toBe('git log nope');
  });

  it('should append oversized files to the GH001 description', () => {
    const stderr = [
      'remote: error: GH001: Large files detected.',
      "remote: error: File assets/video.mov is 120.00 MB; this exceeds GitHub's file size limit of 100.00 MB",
    ].join('\n');
    const error = new GitCommandError({ stdout: '', stderr, exitCode: 1 }, ['push']);

    expect(error.kind).toBe(GitErrorKind.PushWithFileSizeExceedingLimit);
    expect(error.description).toBe(
      "The push operation includes a file which exceeds GitHub's file size restriction of 100MB. Please remove the file from history and try again." +
        '\n\nFile causing error:\n\nassets/video.mov (120.00 MB)'
    );
  });

  it('should fall back to the raw output for undescribed kinds', () => {
    const stderr = 'error: remote origin already exists.';
    const error = new GitCommandError({ stdout: '', stderr, exitCode: 3 }, ['remote', 'add']);

    expect(error.kind).toBe(GitErrorKind.RemoteAlreadyExists);
    expect(error.description).toBeNull();
    expect(error.message).toBe(stderr);
    expect(error.isRawMessage).toBe(true);
  });

  it('should join stdout and stderr for unrecognised output', () => {
    const error = new GitCommandError({ stdout: 'out\n', stderr: 'err\n', exitCode: 1 }, ['x']);

    expect(error.kind).toBeNull();
    expect(error.message).toBe('out\nerr\n');
  });

  it('should report an unknown error when there is no output', () => {
    const error = new GitCommandError({ stdout: '', stderr: '', exitCode: 1 }, []);
    expect(error.message).toBe('Unknown error');
    expect(error.isRawMessage).toBe(false);
    expect(error.command).toBe('git ');
  });

  it('should accept an explicit kind', () => {
    const error = new GitCommandError(
      { stdout: '', stderr: '', exitCode: 1 },
      ['commit'],
      GitErrorKind.NothingToCommit
    );
    expect(error.message).toBe('There are no changes to commit.');
  });
});

describe('checkGitResult', () => {
  it('should return null on a success exit code', () => {
    expect(checkGitResult({ stdout: '', stderr: '', exitCode: 0 }, ['status'])).toBeNull();
    expect(
      checkGitResult({ stdout: '', stderr: '', exitCode: 1 }, ['diff'], { successExitCodes: [0, 1] })
    ).toBeNull();
  });

  it('should return an expected kind instead of throwing', () => {
    const kind = checkGitResult(
      { stdout: 'nothing to commit, working tree clean', stderr: '', exitCode: 1 },
      ['commit'],
      { expectedErrors: [GitErrorKind.NothingToCommit] }
    );
    expect(kind).toBe(GitErrorKind.NothingToCommit);
  });

  it('should throw for an unexpected failure', () => {
    const run = (): unknown =>
      checkGitResult({ stdout: '', stderr: 'fatal: bad revision \'x\'', exitCode: 128 }, ['log'], {
        expectedErrors: [GitErrorKind.NothingToCommit],
      });

    expect(run).toThrow(GitCommandError);
    expect(run).toThrow('Bad revision.');
  });
});
