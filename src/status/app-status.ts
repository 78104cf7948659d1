/**
 * Conversion of decoded status entries into working-directory file changes
 */

import { DiffSelection } from '../diff/selection.js';
import { CONFLICT_STATUS_CODES, mapStatus } from './map-status.js';
import { parsePorcelainStatus } from './parser.js';
import { parseStatusHeaders } from './headers.js';
import {
  GitStatusEntry,
  type AppFileStatus,
  type ConflictFilesDetails,
  type ConflictedFileStatus,
  type FileEntry,
  type StatusEntry,
  type StatusHeader,
  type StatusResult,
  type TextConflictEntry,
  type UnmergedEntry,
  type WorkingDirectoryFileChange,
} from './types.js';

/**
 * Conflict details for when no merge, rebase or stash is in progress
 */
export const NO_CONFLICT_DETAILS: ConflictFilesDetails = {
  conflictCountsByPath: new Map(),
  binaryFilePaths: [],
};

export function isTextConflictEntry(entry: UnmergedEntry): entry is TextConflictEntry {
  return entry.action === 'both-added' || entry.action === 'both-modified';
}

function parseConflictedState(
  entry: UnmergedEntry,
  path: string,
  details: ConflictFilesDetails
): ConflictedFileStatus {
  if (isTextConflictEntry(entry) && !details.binaryFilePaths.includes(path)) {
    return {
      kind: 'conflicted',
      entry,
      conflictMarkerCount: details.conflictCountsByPath.get(path) ?? 0,
    };
  }
  return { kind: 'conflicted', entry };
}

/**
 * Convert a mapped entry to the status shown for a path
 *
 * A rename or copy without its original path is reported as modified.
 */
export function convertToAppStatus(
  path: string,
  entry: FileEntry,
  details: ConflictFilesDetails,
  oldPath?: string
): AppFileStatus {
  const submodule = entry.submoduleStatus !== undefined ? { submoduleStatus: entry.submoduleStatus } : {};

  switch (entry.kind) {
    case 'ordinary': {
      const kind = entry.type === 'added' ? 'new' : entry.type;
      return { kind, ...submodule };
    }
    case 'renamed':
    case 'copied':
      if (oldPath === undefined) {
        return { kind: 'modified', ...submodule };
      }
      return { kind: entry.kind, oldPath, ...submodule };
    case 'untracked':
      return { kind: 'untracked', ...submodule };
    case 'conflicted':
      return parseConflictedState(entry, path, details);
  }
}

/**
 * Build the path-keyed map of working-directory changes
 *
 * Paths added to the index and then deleted from the working tree are
 * skipped. A later untracked record for a path replaces any earlier one.
 * Submodules whose commit did not change start with nothing selected.
 */
export function buildStatusMap(
  entries: readonly StatusEntry[],
  details: ConflictFilesDetails = NO_CONFLICT_DETAILS
): Map<string, WorkingDirectoryFileChange> {
  const files = new Map<string, WorkingDirectoryFileChange>();

  for (const entry of entries) {
    const mapped = mapStatus(entry.statusCode, entry.submoduleStatusCode);

    if (
      mapped.kind === 'ordinary' &&
      mapped.index === GitStatusEntry.Added &&
      mapped.workingTree === GitStatusEntry.Deleted
    ) {
      continue;
    }
    if (mapped.kind === 'untracked') {
      files.delete(entry.path);
    }

    const status = convertToAppStatus(entry.path, mapped, details, entry.oldPath);
    const unchangedSubmodule =
      status.kind === 'modified' &&
      status.submoduleStatus !== undefined &&
      !status.submoduleStatus.commitChanged;

    files.set(entry.path, {
      path: entry.path,
      status,
      selection: unchangedSubmodule ? DiffSelection.empty() : DiffSelection.all(),
    });
  }

  return files;
}

/**
 * Decode porcelain v2 `--branch -z` output into branch data and file changes
 */
export function parseStatus(
  output: string,
  details: ConflictFilesDetails = NO_CONFLICT_DETAILS
): StatusResult {
  const headers: StatusHeader[] = [];
  const entries: StatusEntry[] = [];
  for (const item of parsePorcelainStatus(output)) {
    if (item.kind === 'header') {
      headers.push(item);
    } else {
      entries.push(item);
    }
  }

  return {
    ...parseStatusHeaders(headers),
    files: Array.from(buildStatusMap(entries, details).values()),
    doConflictedFilesExist: entries.some((e) => CONFLICT_STATUS_CODES.includes(e.statusCode)),
  };
}
