/**
 * Decoder for `git status --porcelain=2 -z` output
 *
 * Records are NUL-terminated. Rename and copy records are followed by an
 * extra token holding the original path, so the tokenizer looks one token
 * ahead for those.
 */

import { getLogger } from '../logging/logger.js';
import type { StatusEntry, StatusItem } from './types.js';

const CHANGED_ENTRY_TYPE = '1';
const RENAMED_OR_COPIED_ENTRY_TYPE = '2';
const UNMERGED_ENTRY_TYPE = 'u';
const UNTRACKED_ENTRY_TYPE = '?';
const IGNORED_ENTRY_TYPE = '!';

// 1 <XY> <sub> <mH> <mI> <mW> <hH> <hI> <path>
const CHANGED_ENTRY_RE =
  /^1 ([MADRCUTX?!.]{2}) (N\.\.\.|S[C.][M.][U.]) (\d+) (\d+) (\d+) ([a-f0-9]+) ([a-f0-9]+) ([\s\S]*?)$/;

// 2 <XY> <sub> <mH> <mI> <mW> <hH> <hI> <X><score> <path>
const RENAMED_OR_COPIED_ENTRY_RE =
  /^2 ([MADRCUTX?!.]{2}) (N\.\.\.|S[C.][M.][U.]) (\d+) (\d+) (\d+) ([a-f0-9]+) ([a-f0-9]+) ([RC]\d+) ([\s\S]*?)$/;

// u <XY> <sub> <m1> <m2> <m3> <mW> <h1> <h2> <h3> <path>
const UNMERGED_ENTRY_RE =
  /^u ([DAU]{2}) (N\.\.\.|S[C.][M.][U.]) (\d+) (\d+) (\d+) (\d+) ([a-f0-9]+) ([a-f0-9]+) ([a-f0-9]+) ([\s\S]*?)$/;

function logDropped(token: string, reason: string): void {
  getLogger().debug({ component: 'status', token }, `Dropped status token: ${reason}`);
}

/**
 * Decode porcelain v2 `-z` output into headers and entries
 *
 * Ignored entries and tokens that do not match their record format are
 * dropped.
 */
export function parsePorcelainStatus(output: string): StatusItem[] {
  const items: StatusItem[] = [];
  const tokens = output.split('\0');

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token === '') continue;

    if (token.startsWith('# ')) {
      items.push({ kind: 'header', value: token.slice(2) });
      continue;
    }

    let entry: StatusEntry | null = null;
    switch (token.charAt(0)) {
      case CHANGED_ENTRY_TYPE:
        entry = parseChangedEntry(token);
        break;
      case RENAMED_OR_COPIED_ENTRY_TYPE: {
        // The original path is the following token, consumed even if this one is malformed
        const oldPath = tokens[i + 1];
        i++;
        entry = parseRenamedOrCopiedEntry(token, oldPath);
        break;
      }
      case UNMERGED_ENTRY_TYPE:
        entry = parseUnmergedEntry(token);
        break;
      case UNTRACKED_ENTRY_TYPE:
        entry = parseUntrackedEntry(token);
        break;
      case IGNORED_ENTRY_TYPE:
        break;
      default:
        logDropped(token, 'unknown record type');
    }

    if (entry !== null) {
      items.push(entry);
    }
  }

  return items;
}

export function parseChangedEntry(token: string): StatusEntry | null {
  const match = CHANGED_ENTRY_RE.exec(token);
  if (match === null) {
    logDropped(token, 'malformed changed entry');
    return null;
  }
  const [, statusCode = '', submoduleStatusCode = '', , , , , , path = ''] = match;
  return { kind: 'entry', path, statusCode, submoduleStatusCode };
}

export function parseRenamedOrCopiedEntry(
  token: string,
  oldPath: string | undefined
): StatusEntry | null {
  const match = RENAMED_OR_COPIED_ENTRY_RE.exec(token);
  if (match === null) {
    logDropped(token, 'malformed renamed or copied entry');
    return null;
  }
  if (oldPath === undefined || oldPath === '') {
    logDropped(token, 'missing original path');
    return null;
  }
  const [, statusCode = '', submoduleStatusCode = '', , , , , , , path = ''] = match;
  return { kind: 'entry', path, statusCode, submoduleStatusCode, oldPath };
}

export function parseUnmergedEntry(token: string): StatusEntry | null {
  const match = UNMERGED_ENTRY_RE.exec(token);
  if (match === null) {
    logDropped(token, 'malformed unmerged entry');
    return null;
  }
  const [, statusCode = '', submoduleStatusCode = '', , , , , , , , path = ''] = match;
  return { kind: 'entry', path, statusCode, submoduleStatusCode };
}

/**
 * `? <path>`; untracked records carry no codes, so fixed ones are assigned
 */
export function parseUntrackedEntry(token: string): StatusEntry {
  return {
    kind: 'entry',
    path: token.slice(2),
    statusCode: '??',
    submoduleStatusCode: '????',
  };
}
