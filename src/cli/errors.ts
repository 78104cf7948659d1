/**
 * CLI error types and handlers
 *
 * Defines CLI-specific errors with exit codes for proper process termination.
 * Errors may carry guidance telling the user (or a calling script) how to
 * recover.
 */

/**
 * Recovery guidance attached to an error
 */
export interface ErrorGuidance {
  error: string;
  action_required: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments or unreadable input */
  INVALID_ARGS = 2,
  /** Input file or repository not found */
  NOT_FOUND = 3,
  /** The selection produced an empty patch */
  NOTHING_TO_DO = 4,
}

/**
 * Base CLI error class
 */
export class CLIError extends Error {
  public readonly guidance: ErrorGuidance | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public override readonly cause?: Error,
    guidance?: ErrorGuidance
  ) {
    super(message);
    this.name = 'CLIError';
    this.guidance = guidance;
  }

  /**
   * Create a CLIError with recovery guidance
   */
  static withGuidance(
    guidance: ErrorGuidance,
    exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    cause?: Error
  ): CLIError {
    return new CLIError(guidance.error, exitCode, cause, guidance);
  }
}

/**
 * Error for invalid command arguments
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error when an input file or repository is not found
 */
export class NotFoundError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.NOT_FOUND, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error when the requested operation has nothing to act on
 */
export class NothingToDoError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.NOTHING_TO_DO, cause);
    this.name = 'NothingToDoError';
  }
}

/**
 * Common errors with pre-defined guidance
 */
export const Guidance = {
  notAGitRepo: (path: string): ErrorGuidance => ({
    error: 'Not a git repository',
    action_required: 'Point --repo at a git working tree',
    hint: `Path: ${path}`,
  }),

  inputTooLarge: (bytes: number, limit: number): ErrorGuidance => ({
    error: 'Status output exceeds the configured size limit',
    action_required: 'Raise status.maxOutputBytes or narrow the pathspec',
    command: 'GIT_READOUT_STATUS_MAX_OUTPUT_BYTES=<bytes> git-readout status',
    hint: `Read ${bytes} bytes, limit is ${limit}`,
  }),

  unknownPreset: (name: string, presets: readonly string[]): ErrorGuidance => ({
    error: `Unknown progress preset: ${name}`,
    action_required: 'Choose one of the built-in presets',
    hint: `Presets: ${presets.join(', ')}`,
  }),

  configInvalid: (details: string): ErrorGuidance => ({
    error: 'Invalid configuration',
    action_required: 'Fix the configuration file or the GIT_READOUT_* environment variables',
    hint: details,
  }),
} as const;

/**
 * Format recovery guidance for output
 */
export function formatGuidance(guidance: ErrorGuidance, json = false): string {
  if (json || process.env.GIT_READOUT_OUTPUT === 'json') {
    return JSON.stringify(guidance, null, 2);
  }

  const lines: string[] = [
    `Error: ${guidance.error}`,
    '',
    `Action required: ${guidance.action_required}`,
  ];

  if (guidance.command !== undefined) {
    lines.push('', `Run: ${guidance.command}`);
  }

  if (guidance.hint !== undefined) {
    lines.push('', `Hint: ${guidance.hint}`);
  }

  return lines.join('\n');
}

/**
 * Resolve an error to the exit code and message the CLI reports
 */
export function describeError(error: unknown, json = false): { exitCode: ExitCode; output: string } {
  let exitCode = ExitCode.GENERAL_ERROR;
  let message: string;
  let guidance: ErrorGuidance | undefined;

  if (error instanceof CLIError) {
    exitCode = error.exitCode;
    message = error.message;
    guidance = error.guidance;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  if (guidance !== undefined) {
    return { exitCode, output: formatGuidance(guidance, json) };
  }
  if (json) {
    return { exitCode, output: JSON.stringify({ error: { code: exitCode, message } }) };
  }
  return { exitCode, output: `Error: ${message}` };
}

/**
 * Handle an error and exit the process with appropriate code
 *
 * @param error - Error to handle
 * @param json - Whether to output in JSON format
 */
export function handleError(error: unknown, json = false): never {
  const { exitCode, output } = describeError(error, json);
  console.error(output);
  process.exit(exitCode);
}
