import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CLIError,
  ExitCode,
  Guidance,
  InvalidArgumentError,
  NothingToDoError,
  NotFoundError,
  describeError,
  formatGuidance,
} from '../../../src/cli/errors.js';

describe('CLI errors', () => {
  beforeEach(() => {
    vi.stubEnv('GIT_READOUT_OUTPUT', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should carry exit codes', () => {
    expect(new InvalidArgumentError('x').exitCode).toBe(ExitCode.INVALID_ARGS);
    expect(new NotFoundError('x').exitCode).toBe(ExitCode.NOT_FOUND);
    expect(new NothingToDoError('x').exitCode).toBe(ExitCode.NOTHING_TO_DO);
    expect(new CLIError('x').exitCode).toBe(ExitCode.GENERAL_ERROR);
  });

  it('should format guidance as text', () => {
    expect(formatGuidance(Guidance.unknownPreset('merge', ['clone', 'fetch']))).toBe(
      [
        'Error: Unknown progress preset: merge',
        '',
        'Action required: Choose one of the built-in presets',
        '',
        'Hint: Presets: clone, fetch',
      ].join('\n')
    );
  });

  it('should include the command to run when guidance has one', () => {
    const text = formatGuidance(Guidance.inputTooLarge(2048, 1024));
    expect(text).toContain('\n\nRun: GIT_READOUT_STATUS_MAX_OUTPUT_BYTES=<bytes> git-readout status\n');
    expect(text.endsWith('Hint: Read 2048 bytes, limit is 1024')).toBe(true);
  });

  it('should format guidance as JSON on request', () => {
    const guidance = Guidance.notAGitRepo('/tmp/nowhere');
    expect(JSON.parse(formatGuidance(guidance, true))).toEqual(guidance);
  });

  it('should describe guided errors with their guidance', () => {
    const error = CLIError.withGuidance(Guidance.configInvalid('logging.level: bad'), ExitCode.INVALID_ARGS);
    const { exitCode, output } = describeError(error);

    expect(exitCode).toBe(ExitCode.INVALID_ARGS);
    expect(output.startsWith('Error: Invalid configuration\n')).toBe(true);
  });

  it('should describe plain errors', () => {
    expect(describeError(new NothingToDoError('nothing'), true)).toEqual({
      exitCode: ExitCode.NOTHING_TO_DO,
      output: '{"error":{"code":4,"message":"nothing"}}',
    });
    expect(describeError(new Error('boom'))).toEqual({
      exitCode: ExitCode.GENERAL_ERROR,
      output: 'Error: boom',
    });
    expect(describeError('boom')).toEqual({ exitCode: ExitCode.GENERAL_ERROR, output: 'Error: boom' });
  });
});
