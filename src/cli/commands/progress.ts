/**
 * CLI command: progress
 *
 * Replay git stderr (or a Git LFS progress file) and print the overall
 * percent after each line.
 */

import type { Command } from 'commander';
import { createChildLogger, withLogging } from '../../logging/logger.js';
import { LfsProgressParser } from '../../progress/lfs.js';
import { ProgressSession } from '../../progress/session.js';
import { createProgressParser, isProgressPreset, PROGRESS_PRESETS } from '../../progress/steps.js';
import type { GitParsingResult } from '../../progress/types.js';
import { withContext } from '../context.js';
import { CLIError, ExitCode, Guidance, InvalidArgumentError, handleError } from '../errors.js';
import { readInput, splitLines } from '../input.js';
import { formatProgressEvent } from '../output.js';

/**
 * Progress command options
 */
interface ProgressOptions {
  steps: string;
  lfs?: boolean;
  json?: boolean;
}

/**
 * Settings for replaying a progress stream
 */
export interface ReplayOptions {
  preset: string;
  /** Lines come from the LFS progress file rather than git stderr */
  lfs: boolean;
  /** LFS tracking enabled in configuration */
  trackLfs: boolean;
}

/**
 * Feed every line through a progress session, dropping withheld lines
 *
 * @throws CLIError when the preset is unknown or LFS tracking is disabled
 */
export function replayProgress(lines: readonly string[], options: ReplayOptions): GitParsingResult[] {
  if (!isProgressPreset(options.preset)) {
    throw CLIError.withGuidance(
      Guidance.unknownPreset(options.preset, PROGRESS_PRESETS),
      ExitCode.INVALID_ARGS
    );
  }
  if (options.lfs && !options.trackLfs) {
    throw new InvalidArgumentError('LFS progress tracking is disabled (progress.trackLfs)');
  }

  const session = new ProgressSession(
    createProgressParser(options.preset),
    options.trackLfs ? { lfsParser: new LfsProgressParser() } : {}
  );

  const events: GitParsingResult[] = [];
  for (const line of lines) {
    const event = options.lfs ? session.parseLfsLine(line) : session.parseGitLine(line);
    if (event !== null) {
      events.push(event);
    }
  }
  return events;
}

/**
 * Execute the progress command
 */
async function executeProgress(file: string | undefined, options: ProgressOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext(async ({ config, logger }) => {
      const lines = splitLines(await readInput(file));
      const log = createChildLogger(logger, { component: 'progress' });
      const events = withLogging(
        log,
        'replayProgress',
        () =>
          replayProgress(lines, {
            preset: options.steps,
            lfs: options.lfs === true,
            trackLfs: config.progress.trackLfs,
          }),
        { lines: lines.length, preset: options.steps }
      );
      for (const event of events) {
        console.log(formatProgressEvent(event, { json: isJson }));
      }
    });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the progress command with the program
 */
export function registerProgressCommand(program: Command): void {
  program
    .command('progress')
    .description('Turn git progress output into overall completion percentages')
    .argument('[file]', 'File containing git stderr (default: stdin)')
    .option('-s, --steps <preset>', `Operation preset (${PROGRESS_PRESETS.join(', ')})`, 'clone')
    .option('--lfs', 'Input lines come from a GIT_LFS_PROGRESS file')
    .option('--json', 'Output one JSON object per line')
    .action(async (file: string | undefined, options: ProgressOptions) => {
      await executeProgress(file, options);
    });
}
