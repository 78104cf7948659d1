#!/usr/bin/env node
/**
 * git-readout CLI entry point
 *
 * Classifies git failures, decodes status and progress output, and builds
 * partial patches from the command line.
 */

import { Command } from 'commander';
import { VERSION } from '../version.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerStatusCommand } from './commands/status.js';
import { registerProgressCommand } from './commands/progress.js';
import { registerPatchCommand } from './commands/patch.js';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('git-readout')
    .description('Typed interpretation of git command output')
    .version(VERSION);

  registerClassifyCommand(program);
  registerStatusCommand(program);
  registerProgressCommand(program);
  registerPatchCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
