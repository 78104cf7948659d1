/**
 * Diff model types
 *
 * A text diff as produced by `git diff`, already split into hunks and lines.
 * Line indices are absolute positions within the unified diff output, so a
 * selection can address any line across all hunks.
 */

/**
 * Type of a single diff line
 */
export type DiffLineType = 'context' | 'add' | 'delete' | 'hunk';

/**
 * A line of a unified diff
 */
export interface DiffLine {
  /** Raw text including its leading `+`, `-` or space */
  text: string;
  type: DiffLineType;
  /** Line number in the old file (null for added and hunk lines) */
  oldLineNumber: number | null;
  /** Line number in the new file (null for deleted and hunk lines) */
  newLineNumber: number | null;
  /** The line is followed by `\ No newline at end of file` */
  noTrailingNewLine: boolean;
}

/**
 * Parsed `@@ -a,b +c,d @@ heading` header
 */
export interface DiffHunkHeader {
  oldStartLine: number;
  oldLineCount: number;
  newStartLine: number;
  newLineCount: number;
  sectionHeading?: string;
}

/**
 * A hunk and the span of unified diff lines it covers
 */
export interface DiffHunk {
  header: DiffHunkHeader;
  lines: DiffLine[];
  /** Absolute index of the first line (the `@@` line) */
  unifiedDiffStart: number;
  /** Absolute index of the last line */
  unifiedDiffEnd: number;
}

/**
 * A textual diff for one file
 */
export interface TextDiff {
  /** Unified diff body, when available */
  text?: string;
  hunks: DiffHunk[];
}

/**
 * How much of a diff a selection covers
 */
export type DiffSelectionType = 'all' | 'none' | 'partial';
