/**
 * Patch reconstruction from a partially selected diff
 *
 * Builds patches suitable for `git apply` that contain only the selected
 * changes of a file (to stage them) or their inverse (to discard them from
 * the working copy). Hunk line counts are recomputed from the lines that are
 * actually emitted.
 */

import { GitReadoutError, ReadoutErrorCode } from '../errors/types.js';
import type { WorkingDirectoryFileChange } from '../status/types.js';
import type { DiffSelection } from './selection.js';
import type { DiffHunk, DiffLine, TextDiff } from './types.js';

const NO_NEWLINE_MARKER = '\\ No newline at end of file\n';

/**
 * Thrown when a staging patch would contain no hunks
 */
export class EmptyPatchError extends GitReadoutError {
  constructor(public readonly path: string) {
    super(`Could not generate a patch, no changes for file ${path}`, ReadoutErrorCode.EMPTY_PATCH);
    this.name = 'EmptyPatchError';
  }
}

/**
 * `--- a/<from>` / `+++ b/<to>` header; a missing path becomes /dev/null
 */
export function formatPatchHeader(from: string | null, to: string | null): string {
  const fromPath = from !== null ? `a/${from}` : '/dev/null';
  const toPath = to !== null ? `b/${to}` : '/dev/null';
  return `--- ${fromPath}\n+++ ${toPath}\n`;
}

/**
 * Patch header for a working-directory file; new and untracked files have no "from" side
 */
export function formatPatchHeaderForFile(file: Pick<WorkingDirectoryFileChange, 'path' | 'status'>): string {
  switch (file.status.kind) {
    case 'new':
    case 'untracked':
      return formatPatchHeader(null, file.path);
    default:
      return formatPatchHeader(file.path, file.path);
  }
}

/**
 * `@@ -a,b +c,d @@ heading` with counts of 1 left out
 */
export function formatHunkHeader(
  oldStartLine: number,
  oldLineCount: number,
  newStartLine: number,
  newLineCount: number,
  sectionHeading?: string
): string {
  const before = oldLineCount === 1 ? `${oldStartLine}` : `${oldStartLine},${oldLineCount}`;
  const after = newLineCount === 1 ? `${newStartLine}` : `${newStartLine},${newLineCount}`;
  const heading = sectionHeading !== undefined && sectionHeading !== '' ? ` ${sectionHeading}` : '';
  return `@@ -${before} +${after} @@${heading}\n`;
}

/**
 * How a single diff line appears in a reconstructed hunk
 */
type LineOutcome =
  | { emit: string; old: boolean; new: boolean; change: boolean }
  | null;

interface HunkBody {
  text: string;
  oldCount: number;
  newCount: number;
  hasChanges: boolean;
}

function buildHunkBody(
  hunk: DiffHunk,
  outcome: (line: DiffLine, lineIndex: number) => LineOutcome
): HunkBody {
  const body: HunkBody = { text: '', oldCount: 0, newCount: 0, hasChanges: false };

  hunk.lines.forEach((line, i) => {
    if (line.type === 'hunk') return;

    const result = outcome(line, hunk.unifiedDiffStart + i);
    if (result === null) return;

    body.text += `${result.emit}\n`;
    if (result.old) body.oldCount++;
    if (result.new) body.newCount++;
    if (result.change) body.hasChanges = true;
    if (line.noTrailingNewLine) body.text += NO_NEWLINE_MARKER;
  });

  return body;
}

const asContext = (line: DiffLine): string => ` ${line.text.slice(1)}`;

/**
 * Build a patch that stages the selected lines of a file
 *
 * @throws EmptyPatchError when no selected change remains
 */
export function formatPatch(file: WorkingDirectoryFileChange, diff: TextDiff): string {
  const isNewFile = file.status.kind === 'new' || file.status.kind === 'untracked';
  let patch = '';

  for (const hunk of diff.hunks) {
    const body = buildHunkBody(hunk, (line, lineIndex): LineOutcome => {
      if (line.type === 'context') {
        return { emit: line.text, old: true, new: true, change: false };
      }
      if (file.selection.isSelected(lineIndex)) {
        const isAdd = line.type === 'add';
        return { emit: line.text, old: !isAdd, new: isAdd, change: true };
      }
      if (isNewFile) {
        return null;
      }
      if (line.type === 'add') {
        return { emit: asContext(line), old: true, new: true, change: false };
      }
      return null;
    });

    if (!body.hasChanges) continue;

    patch +=
      formatHunkHeader(
        hunk.header.oldStartLine,
        body.oldCount,
        hunk.header.newStartLine,
        body.newCount,
        hunk.header.sectionHeading
      ) + body.text;
  }

  if (patch === '') {
    throw new EmptyPatchError(file.path);
  }

  return formatPatchHeaderForFile(file) + patch;
}

/**
 * Build a patch that reverts the selected lines in the working copy
 *
 * The patch is applied to the working copy, so its hunks start at the
 * original hunk's new start line on both sides.
 *
 * @returns null when nothing is selected
 */
export function formatPatchToDiscardChanges(
  path: string,
  diff: TextDiff,
  selection: DiffSelection
): string | null {
  let patch = '';

  for (const hunk of diff.hunks) {
    const body = buildHunkBody(hunk, (line, lineIndex): LineOutcome => {
      if (line.type === 'context') {
        return { emit: line.text, old: true, new: true, change: false };
      }
      const selected = selection.isSelected(lineIndex);
      if (line.type === 'add') {
        return selected
          ? { emit: `-${line.text.slice(1)}`, old: true, new: false, change: true }
          : { emit: asContext(line), old: true, new: true, change: false };
      }
      return selected
        ? { emit: `+${line.text.slice(1)}`, old: false, new: true, change: true }
        : null;
    });

    if (!body.hasChanges) continue;

    const start = hunk.header.newStartLine;
    patch +=
      formatHunkHeader(start, body.oldCount, start, body.newCount, hunk.header.sectionHeading) +
      body.text;
  }

  if (patch === '') {
    return null;
  }

  return formatPatchHeader(path, path) + patch;
}
