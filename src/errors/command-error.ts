/**
 * Error raised for a git invocation that failed unexpectedly
 */

import { classifyResult, isExpectedError } from './classifier.js';
import { describe } from './descriptions.js';
import { getOversizedFiles } from './oversized.js';
import { GitErrorKind, GitReadoutError, ReadoutErrorCode, type GitCommandResult } from './types.js';

/**
 * Build the display message for a failed command
 */
function buildMessage(
  result: GitCommandResult,
  description: string | null
): { message: string; isRawMessage: boolean } {
  if (description !== null) {
    return { message: description, isRawMessage: false };
  }
  const combined = `${result.stdout}${result.stderr}`;
  if (combined.length > 0) {
    return { message: combined, isRawMessage: true };
  }
  if (result.stderr.length > 0) {
    return { message: result.stderr, isRawMessage: true };
  }
  if (result.stdout.length > 0) {
    return { message: result.stdout, isRawMessage: true };
  }
  return { message: 'Unknown error', isRawMessage: false };
}

/**
 * A failed git command, with its output classified
 */
export class GitCommandError extends GitReadoutError {
  /** Classified failure, or null when the output was not recognised */
  public readonly kind: GitErrorKind | null;
  /** Description of the kind, extended with offending files for GH001 */
  public readonly description: string | null;
  /** True when the message is raw git output rather than a description */
  public readonly isRawMessage: boolean;

  constructor(
    public readonly result: GitCommandResult,
    public readonly args: readonly string[],
    kind: GitErrorKind | null = classifyResult(result)
  ) {
    let description = kind !== null ? describe(kind) : null;
    if (kind === GitErrorKind.PushWithFileSizeExceedingLimit && description !== null) {
      const files = getOversizedFiles(`${result.stdout}${result.stderr}`);
      if (files.length > 0) {
        description += `\n\nFile causing error:\n\n${files.join('\n')}`;
      }
    }

    const { message, isRawMessage } = buildMessage(result, description);
    super(message, ReadoutErrorCode.COMMAND_FAILED);
    this.name = 'GitCommandError';
    this.kind = kind;
    this.description = description;
    this.isRawMessage = isRawMessage;
  }

  /**
   * The command line as it was run, for logs
   */
  get command(): string {
    return `git ${this.args.join(' ')}`;
  }
}

/**
 * Options for checking a command result
 */
export interface CheckResultOptions {
  /** Exit codes treated as success (default: [0]) */
  successExitCodes?: readonly number[];
  /** Kinds the caller handles itself; these do not throw */
  expectedErrors?: readonly GitErrorKind[];
}

/**
 * Classify a finished command and throw unless it succeeded or failed in an expected way
 *
 * @returns The classified kind when the exit code was not a success code, else null
 * @throws GitCommandError for any other failure
 */
export function checkGitResult(
  result: GitCommandResult,
  args: readonly string[],
  options: CheckResultOptions = {}
): GitErrorKind | null {
  const successExitCodes = options.successExitCodes ?? [0];
  if (successExitCodes.includes(result.exitCode)) {
    return null;
  }

  const kind = classifyResult(result);
  if (options.expectedErrors !== undefined && isExpectedError(kind, options.expectedErrors)) {
    return kind;
  }

  throw new GitCommandError(result, args, kind);
}
