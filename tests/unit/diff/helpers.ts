import type { DiffHunk, DiffLine, DiffLineType, TextDiff } from '../../../src/diff/types.js';

export function line(
  text: string,
  oldLineNumber: number | null = null,
  newLineNumber: number | null = null,
  noTrailingNewLine = false
): DiffLine {
  const prefix = text.charAt(0);
  let type: DiffLineType = 'context';
  if (text.startsWith('@@')) type = 'hunk';
  else if (prefix === '+') type = 'add';
  else if (prefix === '-') type = 'delete';
  return { text, type, oldLineNumber, newLineNumber, noTrailingNewLine };
}

export function hunk(
  unifiedDiffStart: number,
  header: DiffHunk['header'],
  lines: DiffLine[]
): DiffHunk {
  return { header, lines, unifiedDiffStart, unifiedDiffEnd: unifiedDiffStart + lines.length - 1 };
}

/**
 * Two hunks of a modified file; selectable lines are 2, 3, 4 and 9
 */
export function modifiedFileDiff(): TextDiff {
  return {
    hunks: [
      hunk(
        0,
        { oldStartLine: 1, oldLineCount: 4, newStartLine: 1, newLineCount: 5, sectionHeading: 'function main()' },
        [
          line('@@ -1,4 +1,5 @@ function main()'),
          line(' const a = 1;', 1, 1),
          line('-const b = 2;', 2, null),
          line('+const b = 3;', null, 2),
          line('+const c = 4;', null, 3),
          line(' const d = 5;', 3, 4),
          line(' export { a };', 4, 5),
        ]
      ),
      hunk(7, { oldStartLine: 10, oldLineCount: 2, newStartLine: 11, newLineCount: 1 }, [
        line('@@ -10,2 +11 @@'),
        line(' line ten', 10, 11),
        line('-line eleven', 11, null),
      ]),
    ],
  };
}

/**
 * A three-line new file without a trailing newline; selectable lines are 1 to 3
 */
export function newFileDiff(): TextDiff {
  return {
    hunks: [
      hunk(0, { oldStartLine: 0, oldLineCount: 0, newStartLine: 1, newLineCount: 3 }, [
        line('@@ -0,0 +1,3 @@'),
        line('+one', null, 1),
        line('+two', null, 2),
        line('+three', null, 3, true),
      ]),
    ],
  };
}
