/**
 * Status decoding types
 */

import type { DiffSelection } from '../diff/selection.js';

/**
 * One-letter state of a path in the index or working tree
 */
export enum GitStatusEntry {
  Modified = 'M',
  Added = 'A',
  Deleted = 'D',
  Renamed = 'R',
  Copied = 'C',
  Unchanged = '.',
  Untracked = '?',
  Ignored = '!',
  UpdatedButUnmerged = 'U',
}

/**
 * A `# key value` header line from porcelain v2 output
 */
export interface StatusHeader {
  kind: 'header';
  value: string;
}

/**
 * A file record from porcelain v2 output
 */
export interface StatusEntry {
  kind: 'entry';
  path: string;
  /** Two-character XY code, e.g. `.M` */
  statusCode: string;
  /** Four-character submodule code, e.g. `N...` or `SC..` */
  submoduleStatusCode: string;
  /** Source path of a rename or copy */
  oldPath?: string;
}

export type StatusItem = StatusHeader | StatusEntry;

/**
 * Submodule state flags decoded from an `S...` code
 */
export interface SubmoduleStatus {
  /** The submodule points at a different commit */
  commitChanged: boolean;
  /** The submodule has tracked changes */
  modifiedChanges: boolean;
  /** The submodule has untracked files */
  untrackedChanges: boolean;
}

export interface OrdinaryEntry {
  kind: 'ordinary';
  type: 'added' | 'modified' | 'deleted';
  index?: GitStatusEntry;
  workingTree?: GitStatusEntry;
  submoduleStatus?: SubmoduleStatus;
}

export interface RenamedOrCopiedEntry {
  kind: 'renamed' | 'copied';
  index?: GitStatusEntry;
  workingTree?: GitStatusEntry;
  submoduleStatus?: SubmoduleStatus;
}

export interface UntrackedEntry {
  kind: 'untracked';
  submoduleStatus?: SubmoduleStatus;
}

/**
 * How each side of a merge left a conflicted path
 */
export type UnmergedEntrySummary =
  | 'added-by-us'
  | 'deleted-by-us'
  | 'added-by-them'
  | 'deleted-by-them'
  | 'both-deleted'
  | 'both-added'
  | 'both-modified';

/**
 * A conflict that can be resolved by editing conflict markers
 */
export interface TextConflictEntry {
  kind: 'conflicted';
  action: 'both-added' | 'both-modified';
  us: GitStatusEntry;
  them: GitStatusEntry;
  submoduleStatus?: SubmoduleStatus;
}

/**
 * A conflict that must be resolved by picking a side
 */
export interface ManualConflictEntry {
  kind: 'conflicted';
  action: Exclude<UnmergedEntrySummary, TextConflictEntry['action']>;
  us: GitStatusEntry;
  them: GitStatusEntry;
  submoduleStatus?: SubmoduleStatus;
}

export type UnmergedEntry = TextConflictEntry | ManualConflictEntry;

export type FileEntry = OrdinaryEntry | RenamedOrCopiedEntry | UntrackedEntry | UnmergedEntry;

/**
 * Working-directory status of a path as presented to the user
 */
export type AppFileStatus =
  | { kind: 'new' | 'modified' | 'deleted'; submoduleStatus?: SubmoduleStatus }
  | { kind: 'renamed' | 'copied'; oldPath: string; submoduleStatus?: SubmoduleStatus }
  | { kind: 'untracked'; submoduleStatus?: SubmoduleStatus }
  | ConflictedFileStatus;

export type AppFileStatusKind = AppFileStatus['kind'];

export interface ConflictsWithMarkers {
  kind: 'conflicted';
  entry: TextConflictEntry;
  conflictMarkerCount: number;
  submoduleStatus?: SubmoduleStatus;
}

export interface ManualConflict {
  kind: 'conflicted';
  entry: UnmergedEntry;
  submoduleStatus?: SubmoduleStatus;
}

export type ConflictedFileStatus = ConflictsWithMarkers | ManualConflict;

/**
 * Conflict information gathered outside the status output
 */
export interface ConflictFilesDetails {
  /** Remaining conflict markers per path (from `git diff --check`) */
  conflictCountsByPath: ReadonlyMap<string, number>;
  /** Paths git considers binary */
  binaryFilePaths: readonly string[];
}

/**
 * A changed path in the working directory with its line selection
 */
export interface WorkingDirectoryFileChange {
  path: string;
  status: AppFileStatus;
  selection: DiffSelection;
}

export interface AheadBehind {
  ahead: number;
  behind: number;
}

/**
 * Branch information decoded from status headers
 */
export interface StatusHeadersData {
  currentBranch?: string;
  currentUpstreamBranch?: string;
  currentTip?: string;
  branchAheadBehind?: AheadBehind;
}

/**
 * Decoded `git status --porcelain=2 --branch -z` output
 */
export interface StatusResult extends StatusHeadersData {
  /** Changed files, in the order git reported them */
  files: WorkingDirectoryFileChange[];
  /** Any entry carries an unmerged status code */
  doConflictedFilesExist: boolean;
}
