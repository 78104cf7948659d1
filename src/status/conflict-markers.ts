/**
 * Conflict marker counting from `git diff --check` output
 */

const LEFTOVER_MARKER_RE = /^(.+):\d+: leftover conflict marker$/gm;

/**
 * Count leftover conflict markers per path
 */
export function parseConflictMarkerCounts(diffCheckOutput: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const match of diffCheckOutput.matchAll(LEFTOVER_MARKER_RE)) {
    const path = match[1];
    if (path === undefined) continue;
    counts.set(path, (counts.get(path) ?? 0) + 1);
  }
  return counts;
}
