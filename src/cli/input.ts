/**
 * Input reading for CLI commands
 *
 * Commands read git output from a file argument or, when none is given,
 * from stdin.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { NotFoundError } from './errors.js';

/**
 * Read all of stdin as UTF-8
 */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Read command input from a file, or stdin when no file is given
 *
 * @throws NotFoundError when the file does not exist
 */
export async function readInput(file: string | undefined): Promise<string> {
  if (file === undefined || file === '-') {
    return readStdin();
  }

  const path = resolve(file);
  if (!existsSync(path)) {
    throw new NotFoundError(`Input file not found: ${path}`);
  }
  return readFile(path, 'utf-8');
}

/**
 * Split text into lines, accepting `\n`, `\r\n` and the bare `\r` git uses
 * to redraw progress in place
 */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/).filter((line) => line !== '');
}
