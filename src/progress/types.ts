/**
 * Progress decoding types
 */

/**
 * A phase of a git operation, identified by the title git prints for it
 *
 * For `remote: Compressing objects:  14% (159/1133)` the title is
 * `remote: Compressing objects`. Weights are relative to the other steps of
 * the same parser.
 */
export interface ProgressStep {
  title: string;
  weight: number;
}

/**
 * A decoded progress line
 */
export interface GitProgressInfo {
  title: string;
  /** Units processed so far (159 in `14% (159/1133)`) */
  value: number;
  /** Total units, when the line reports one */
  total?: number;
  /** Percent printed by git for this phase, when present */
  percent?: number;
  /** The line ended with `, done.` */
  done: boolean;
  /** The raw line */
  text: string;
}

/**
 * A line recognised as progress, with the overall percent of the operation
 */
export interface GitProgress {
  kind: 'progress';
  percent: number;
  details: GitProgressInfo;
}

/**
 * A line that carries no progress; percent repeats the last reported value
 */
export interface GitOutput {
  kind: 'context';
  percent: number;
  text: string;
}

export type GitParsingResult = GitProgress | GitOutput;

/**
 * The parts of a commit the multi-commit parsers report
 */
export interface CommitSummary {
  summary: string;
}

/**
 * Progress through a rebase or cherry-pick of several commits
 */
export interface MultiCommitOperationProgress {
  kind: 'multiCommitOperation';
  currentCommitSummary: string;
  /** One-based position of the commit being applied */
  position: number;
  totalCommitCount: number;
  /** Fraction complete between 0 and 1, two decimals */
  value: number;
}
