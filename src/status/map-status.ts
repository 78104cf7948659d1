/**
 * Mapping of porcelain status codes to file entries
 */

import { GitStatusEntry, type FileEntry, type SubmoduleStatus } from './types.js';

const {
  Modified,
  Added,
  Deleted,
  Renamed,
  Copied,
  Unchanged,
  UpdatedButUnmerged,
} = GitStatusEntry;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type EntryWithoutSubmodule = DistributiveOmit<FileEntry, 'submoduleStatus'>;

const UNKNOWN_ENTRY: EntryWithoutSubmodule = { kind: 'ordinary', type: 'modified' };

const STATUS_TABLE: Readonly<Record<string, EntryWithoutSubmodule>> = {
  '??': { kind: 'untracked' },
  '.M': { kind: 'ordinary', type: 'modified', index: Unchanged, workingTree: Modified },
  'M.': { kind: 'ordinary', type: 'modified', index: Modified, workingTree: Unchanged },
  '.A': { kind: 'ordinary', type: 'added', index: Unchanged, workingTree: Added },
  'A.': { kind: 'ordinary', type: 'added', index: Added, workingTree: Unchanged },
  '.D': { kind: 'ordinary', type: 'deleted', index: Unchanged, workingTree: Deleted },
  'D.': { kind: 'ordinary', type: 'deleted', index: Deleted, workingTree: Unchanged },
  '.R': { kind: 'renamed', index: Unchanged, workingTree: Renamed },
  'R.': { kind: 'renamed', index: Renamed, workingTree: Unchanged },
  '.C': { kind: 'copied', index: Unchanged, workingTree: Copied },
  'C.': { kind: 'copied', index: Copied, workingTree: Unchanged },
  AD: { kind: 'ordinary', type: 'added', index: Added, workingTree: Deleted },
  AM: { kind: 'ordinary', type: 'added', index: Added, workingTree: Modified },
  RM: { kind: 'renamed', index: Renamed, workingTree: Modified },
  RD: { kind: 'renamed', index: Renamed, workingTree: Deleted },
  DD: { kind: 'conflicted', action: 'both-deleted', us: Deleted, them: Deleted },
  AU: { kind: 'conflicted', action: 'added-by-us', us: Added, them: UpdatedButUnmerged },
  UD: { kind: 'conflicted', action: 'deleted-by-them', us: UpdatedButUnmerged, them: Deleted },
  UA: { kind: 'conflicted', action: 'added-by-them', us: UpdatedButUnmerged, them: Added },
  DU: { kind: 'conflicted', action: 'deleted-by-us', us: Deleted, them: UpdatedButUnmerged },
  AA: { kind: 'conflicted', action: 'both-added', us: Added, them: Added },
  UU: {
    kind: 'conflicted',
    action: 'both-modified',
    us: UpdatedButUnmerged,
    them: UpdatedButUnmerged,
  },
};

/**
 * Status codes that mark a path as unmerged
 */
export const CONFLICT_STATUS_CODES: readonly string[] = ['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU'];

/**
 * Decode a four-character submodule code (`N...` or `S<c><m><u>`)
 *
 * @returns null when the path is not a submodule
 */
export function mapSubmoduleStatus(submoduleStatusCode: string): SubmoduleStatus | null {
  if (!submoduleStatusCode.startsWith('S')) {
    return null;
  }
  return {
    commitChanged: submoduleStatusCode.charAt(1) === 'C',
    modifiedChanges: submoduleStatusCode.charAt(2) === 'M',
    untrackedChanges: submoduleStatusCode.charAt(3) === 'U',
  };
}

/**
 * Map an XY status code to a file entry
 *
 * Codes outside the table map to a modified ordinary entry whose index and
 * working-tree states are unknown.
 */
export function mapStatus(statusCode: string, submoduleStatusCode: string): FileEntry {
  const submoduleStatus = mapSubmoduleStatus(submoduleStatusCode) ?? undefined;
  const known = Object.hasOwn(STATUS_TABLE, statusCode) ? STATUS_TABLE[statusCode] : undefined;
  const entry = known ?? UNKNOWN_ENTRY;

  return submoduleStatus !== undefined ? { ...entry, submoduleStatus } : { ...entry };
}
