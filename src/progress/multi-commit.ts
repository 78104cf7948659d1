/**
 * Progress through operations that apply several commits in turn
 */

import type { CommitSummary, MultiCommitOperationProgress } from './types.js';

const REBASING_RE = /Rebasing \((\d+)\/(\d+)\)/;
const CHERRY_PICKED_RE = /^\[(.*\s.*)\]/;

/**
 * Clamp a fraction to [0, 1] and round it to two decimals
 */
export function formatRebaseValue(value: number): number {
  const clamped = Math.max(0, Math.min(value, 1));
  return Math.round(clamped * 100) / 100;
}

/**
 * Reads `Rebasing (n/m)` lines from `git rebase` output
 */
export class RebaseProgressParser {
  constructor(private readonly commits: readonly CommitSummary[]) {}

  /**
   * @returns null for lines that are not rebase progress
   */
  parse(line: string): MultiCommitOperationProgress | null {
    const match = REBASING_RE.exec(line);
    if (match === null) {
      return null;
    }

    const [, rebased = '0', total = '0'] = match;
    const position = parseInt(rebased, 10);
    const totalCommitCount = parseInt(total, 10);

    return {
      kind: 'multiCommitOperation',
      currentCommitSummary: this.commits[position - 1]?.summary ?? '',
      position,
      totalCommitCount,
      value: formatRebaseValue(totalCommitCount > 0 ? position / totalCommitCount : 0),
    };
  }
}

/**
 * Counts the `[branch sha] summary` lines `git cherry-pick` prints per commit
 */
export class CherryPickProgressParser {
  private count: number;

  /**
   * @param count - Commits already applied before this stream started
   */
  constructor(
    private readonly commits: readonly CommitSummary[],
    count = 0
  ) {
    this.count = count;
  }

  /**
   * @returns null for lines that do not report a picked commit
   */
  parse(line: string): MultiCommitOperationProgress | null {
    if (!CHERRY_PICKED_RE.test(line)) {
      return null;
    }

    this.count++;
    const total = this.commits.length;

    return {
      kind: 'multiCommitOperation',
      currentCommitSummary: this.commits[this.count - 1]?.summary ?? '',
      position: this.count,
      totalCommitCount: total,
      value: total > 0 ? Math.round((this.count / total) * 100) / 100 : 0,
    };
  }
}
