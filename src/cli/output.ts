/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 * Formatters return strings; commands decide where to write them.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { GitErrorKind } from '../errors/types.js';
import type { GitParsingResult, MultiCommitOperationProgress } from '../progress/types.js';
import type { AppFileStatus, StatusResult } from '../status/types.js';
import type { DiffSelectionType } from '../diff/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Classified failure for display
 */
export interface ClassificationDisplay {
  kind: GitErrorKind | null;
  description: string | null;
  oversizedFiles: string[];
}

/**
 * File change for display
 */
export interface FileDisplay {
  path: string;
  status: AppFileStatus['kind'];
  oldPath?: string;
  conflictMarkerCount?: number;
  selection: DiffSelectionType;
}

/**
 * Status output for display
 */
export interface StatusDisplay {
  currentBranch?: string;
  currentUpstreamBranch?: string;
  currentTip?: string;
  ahead?: number;
  behind?: number;
  doConflictedFilesExist: boolean;
  files: FileDisplay[];
}

const STATUS_LABELS: Record<AppFileStatus['kind'], string> = {
  new: 'A',
  modified: 'M',
  deleted: 'D',
  renamed: 'R',
  copied: 'C',
  untracked: '?',
  conflicted: 'U',
};

/**
 * Format a classification result for output
 */
export function formatClassification(
  result: ClassificationDisplay,
  options: OutputOptions = {},
  fmt: ChalkInstance = chalk
): string {
  if (options.json === true) {
    return JSON.stringify(result, null, 2);
  }

  if (result.kind === null) {
    return fmt.yellow('No known git error recognised');
  }

  const lines = [`${fmt.bold('Kind:')} ${fmt.red(result.kind)}`];
  if (result.description !== null) {
    lines.push('', result.description);
  }
  if (result.oversizedFiles.length > 0) {
    lines.push('', fmt.bold('Oversized files:'));
    for (const file of result.oversizedFiles) {
      lines.push(`  - ${file}`);
    }
  }
  return lines.join('\n');
}

/**
 * Flatten a decoded status into plain display data
 */
export function toStatusDisplay(result: StatusResult): StatusDisplay {
  const display: StatusDisplay = {
    doConflictedFilesExist: result.doConflictedFilesExist,
    files: result.files.map((file) => {
      const entry: FileDisplay = {
        path: file.path,
        status: file.status.kind,
        selection: file.selection.getSelectionType(),
      };
      if (file.status.kind === 'renamed' || file.status.kind === 'copied') {
        entry.oldPath = file.status.oldPath;
      }
      if (file.status.kind === 'conflicted' && 'conflictMarkerCount' in file.status) {
        entry.conflictMarkerCount = file.status.conflictMarkerCount;
      }
      return entry;
    }),
  };

  if (result.currentBranch !== undefined) display.currentBranch = result.currentBranch;
  if (result.currentUpstreamBranch !== undefined) {
    display.currentUpstreamBranch = result.currentUpstreamBranch;
  }
  if (result.currentTip !== undefined) display.currentTip = result.currentTip;
  if (result.branchAheadBehind !== undefined) {
    display.ahead = result.branchAheadBehind.ahead;
    display.behind = result.branchAheadBehind.behind;
  }
  return display;
}

function colorStatus(fmt: ChalkInstance, kind: AppFileStatus['kind'], text: string): string {
  switch (kind) {
    case 'new':
    case 'untracked':
      return fmt.green(text);
    case 'deleted':
      return fmt.red(text);
    case 'conflicted':
      return fmt.magenta(text);
    default:
      return fmt.yellow(text);
  }
}

/**
 * Format a decoded status for output
 */
export function formatStatus(
  display: StatusDisplay,
  options: OutputOptions = {},
  fmt: ChalkInstance = chalk
): string {
  if (options.json === true) {
    return JSON.stringify(display, null, 2);
  }

  const lines = [`${fmt.bold('Branch:')} ${display.currentBranch ?? '(detached)'}`];
  if (display.currentUpstreamBranch !== undefined) {
    lines.push(`${fmt.bold('Upstream:')} ${display.currentUpstreamBranch}`);
  }
  if (display.currentTip !== undefined) {
    lines.push(`${fmt.bold('Tip:')} ${display.currentTip.substring(0, 8)}`);
  }
  if (display.ahead !== undefined && display.behind !== undefined) {
    lines.push(`${fmt.bold('Ahead/behind:')} +${display.ahead} -${display.behind}`);
  }

  lines.push('');
  if (display.files.length === 0) {
    lines.push(fmt.dim('Working directory clean'));
    return lines.join('\n');
  }

  for (const file of display.files) {
    let line = `  ${colorStatus(fmt, file.status, STATUS_LABELS[file.status])} ${file.path}`;
    if (file.oldPath !== undefined) {
      line += fmt.dim(` (from ${file.oldPath})`);
    }
    if (file.conflictMarkerCount !== undefined) {
      line += fmt.dim(` (${file.conflictMarkerCount} conflict markers)`);
    }
    lines.push(line);
  }

  if (display.doConflictedFilesExist) {
    lines.push('', fmt.magenta('Unmerged paths present'));
  }
  return lines.join('\n');
}

/**
 * Format a single progress event as one line
 */
export function formatProgressEvent(
  event: GitParsingResult | MultiCommitOperationProgress,
  options: OutputOptions = {},
  fmt: ChalkInstance = chalk
): string {
  if (options.json === true) {
    return JSON.stringify(event);
  }

  switch (event.kind) {
    case 'progress': {
      const percent = `[${String(event.percent).padStart(3)}%]`;
      const done = event.details.done ? fmt.green(' done') : '';
      return `${fmt.cyan(percent)} ${event.details.text}${done}`;
    }
    case 'context':
      return fmt.dim(`[${String(event.percent).padStart(3)}%] ${event.text}`);
    case 'multiCommitOperation': {
      const percent = `[${String(Math.round(event.value * 100)).padStart(3)}%]`;
      return `${fmt.cyan(percent)} ${event.position}/${event.totalCommitCount} ${event.currentCommitSummary}`;
    }
  }
}
