/**
 * CLI command: classify
 *
 * Classify git failure output and explain it.
 */

import type { Command } from 'commander';
import { classify } from '../../errors/classifier.js';
import { describe } from '../../errors/descriptions.js';
import { getOversizedFiles } from '../../errors/oversized.js';
import { GitErrorKind } from '../../errors/types.js';
import { createChildLogger, withLogging } from '../../logging/logger.js';
import { withContext } from '../context.js';
import { handleError } from '../errors.js';
import { readInput } from '../input.js';
import { formatClassification, type ClassificationDisplay } from '../output.js';

/**
 * Classify command options
 */
interface ClassifyOptions {
  json?: boolean;
}

/**
 * Classify text and collect everything the CLI reports about it
 */
export function buildClassification(text: string): ClassificationDisplay {
  const kind = classify(text);
  return {
    kind,
    description: kind !== null ? describe(kind) : null,
    oversizedFiles: kind === GitErrorKind.PushWithFileSizeExceedingLimit ? getOversizedFiles(text) : [],
  };
}

/**
 * Execute the classify command
 */
async function executeClassify(file: string | undefined, options: ClassifyOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext(async ({ logger }) => {
      const text = await readInput(file);
      const log = createChildLogger(logger, { component: 'classify' });
      const result = withLogging(log, 'classify', () => buildClassification(text));
      log.debug({ kind: result.kind }, 'Classified git output');
      console.log(formatClassification(result, { json: isJson }));
    });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the classify command with the program
 */
export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Classify git error output (stderr, then stdout) into a known failure kind')
    .argument('[file]', 'File containing git output (default: stdin)')
    .option('--json', 'Output in JSON format')
    .action(async (file: string | undefined, options: ClassifyOptions) => {
      await executeClassify(file, options);
    });
}
