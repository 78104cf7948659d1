/**
 * CLI command: patch
 *
 * Build a patch that stages, or discards, the selected lines of a diff.
 */

import type { Command } from 'commander';
import { ZodError } from 'zod';
import { EmptyPatchError, formatPatch, formatPatchToDiscardChanges } from '../../diff/patch.js';
import { PatchRequestSchema, type PatchRequest } from '../../diff/schema.js';
import { DiffSelection } from '../../diff/selection.js';
import { createChildLogger, withLogging, type ReadoutLogger } from '../../logging/logger.js';
import type { AppFileStatus, WorkingDirectoryFileChange } from '../../status/types.js';
import { withContext } from '../context.js';
import { InvalidArgumentError, NothingToDoError, handleError } from '../errors.js';
import { readInput } from '../input.js';

export type PatchMode = 'stage' | 'discard';

/**
 * Patch command options
 */
interface PatchOptions {
  mode: string;
  json?: boolean;
}

function isPatchMode(mode: string): mode is PatchMode {
  return mode === 'stage' || mode === 'discard';
}

/**
 * Parse and validate a patch request
 *
 * @throws InvalidArgumentError when the JSON is malformed or does not match the schema
 */
export function parsePatchRequest(json: string): PatchRequest {
  try {
    return PatchRequestSchema.parse(JSON.parse(json));
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidArgumentError(`Invalid patch request: ${details}`, error);
    }
    throw new InvalidArgumentError(
      `Invalid patch request: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

function toAppFileStatus(request: PatchRequest): AppFileStatus {
  if (request.status === 'renamed' || request.status === 'copied') {
    return { kind: request.status, oldPath: request.oldPath ?? request.path };
  }
  return { kind: request.status };
}

/**
 * Build the patch for a request
 *
 * @throws NothingToDoError when the selection leaves no changes
 */
export function buildPatch(request: PatchRequest, mode: PatchMode): string {
  let selection = DiffSelection.forDiff(request.diff);
  for (const line of request.selectedLines) {
    selection = selection.withLineSelection(line, true);
  }

  if (mode === 'discard') {
    const patch = formatPatchToDiscardChanges(request.path, request.diff, selection);
    if (patch === null) {
      throw new NothingToDoError(`No selected changes to discard in ${request.path}`);
    }
    return patch;
  }

  const file: WorkingDirectoryFileChange = {
    path: request.path,
    status: toAppFileStatus(request),
    selection,
  };
  try {
    return formatPatch(file, request.diff);
  } catch (error) {
    if (error instanceof EmptyPatchError) {
      throw new NothingToDoError(error.message, error);
    }
    throw error;
  }
}

/**
 * Build the patch under a `patch` component logger
 */
export function buildLoggedPatch(
  request: PatchRequest,
  mode: PatchMode,
  logger: ReadoutLogger
): string {
  const log = createChildLogger(logger, { component: 'patch' });
  return withLogging(log, 'buildPatch', () => buildPatch(request, mode), {
    path: request.path,
    mode,
  });
}

/**
 * Execute the patch command
 */
async function executePatch(file: string, options: PatchOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext(async ({ logger }) => {
      const mode = options.mode;
      if (!isPatchMode(mode)) {
        throw new InvalidArgumentError(`Unknown patch mode: ${mode} (expected stage or discard)`);
      }

      const request = parsePatchRequest(await readInput(file));
      const patch = buildLoggedPatch(request, mode, logger);

      if (isJson) {
        console.log(JSON.stringify({ path: request.path, mode, patch }, null, 2));
      } else {
        process.stdout.write(patch);
      }
    });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the patch command with the program
 */
export function registerPatchCommand(program: Command): void {
  program
    .command('patch')
    .description('Build a patch for the selected lines of a diff, to stage or discard them')
    .argument('<diffJson>', 'JSON file with path, status, diff hunks and selectedLines ("-" for stdin)')
    .option('-m, --mode <mode>', 'stage or discard', 'stage')
    .option('--json', 'Output in JSON format')
    .action(async (file: string, options: PatchOptions) => {
      await executePatch(file, options);
    });
}
