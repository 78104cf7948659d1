/**
 * CLI command: status
 *
 * Decode `git status --porcelain=2 --branch -z` output, read from a file,
 * stdin, or a repository.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { simpleGit, type SimpleGit } from 'simple-git';
import type { StatusConfig } from '../../config/schema.js';
import { createChildLogger, withLogging } from '../../logging/logger.js';
import { parseStatus } from '../../status/app-status.js';
import { withContext } from '../context.js';
import { CLIError, ExitCode, Guidance, handleError } from '../errors.js';
import { readInput } from '../input.js';
import { formatStatus, toStatusDisplay } from '../output.js';

/**
 * Status command options
 */
interface StatusOptions {
  repo?: string;
  json?: boolean;
}

/**
 * Arguments for a machine-readable status run
 */
export function buildStatusArgs(untrackedFiles: StatusConfig['untrackedFiles']): string[] {
  return [
    '--no-optional-locks',
    'status',
    `--untracked-files=${untrackedFiles}`,
    '--branch',
    '--porcelain=2',
    '-z',
  ];
}

/**
 * Reject output larger than the configured limit
 *
 * @throws CLIError with INVALID_ARGS when the output is too large
 */
export function assertOutputSize(output: string, config: StatusConfig): void {
  const bytes = Buffer.byteLength(output, 'utf-8');
  if (bytes > config.maxOutputBytes) {
    throw CLIError.withGuidance(
      Guidance.inputTooLarge(bytes, config.maxOutputBytes),
      ExitCode.INVALID_ARGS
    );
  }
}

/**
 * Run `git status` in a repository
 */
async function readRepositoryStatus(repoPath: string, config: StatusConfig): Promise<string> {
  const absolutePath = resolve(repoPath);
  const git: SimpleGit = simpleGit(absolutePath);

  if (!(await git.checkIsRepo())) {
    throw CLIError.withGuidance(Guidance.notAGitRepo(absolutePath), ExitCode.NOT_FOUND);
  }
  return git.raw(buildStatusArgs(config.untrackedFiles));
}

/**
 * Execute the status command
 */
async function executeStatus(file: string | undefined, options: StatusOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext(async ({ config, logger }) => {
      const output =
        options.repo !== undefined
          ? await readRepositoryStatus(options.repo, config.status)
          : await readInput(file);

      assertOutputSize(output, config.status);

      const log = createChildLogger(logger, { component: 'status' });
      const result = withLogging(log, 'decodeStatus', () => parseStatus(output), {
        bytes: output.length,
      });
      log.debug({ files: result.files.length }, 'Decoded status output');
      console.log(formatStatus(toStatusDisplay(result), { json: isJson }));
    });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the status command with the program
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Decode porcelain v2 status output into file changes and branch information')
    .argument('[file]', 'File containing `git status --porcelain=2 --branch -z` output (default: stdin)')
    .option('-r, --repo <path>', 'Run git status in this repository instead of reading input')
    .option('--json', 'Output in JSON format')
    .action(async (file: string | undefined, options: StatusOptions) => {
      await executeStatus(file, options);
    });
}
