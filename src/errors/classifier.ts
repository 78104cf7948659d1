/**
 * Classification of git failure output
 */

import { GIT_ERROR_RULES } from './rules.js';
import type { GitCommandResult, GitErrorKind } from './types.js';

/**
 * Classify git output into a GitErrorKind
 *
 * Rules are tried in table order and the first pattern that matches anywhere
 * in the text wins.
 *
 * @returns The matched kind, or null when no rule recognises the text
 */
export function classify(text: string): GitErrorKind | null {
  for (const rule of GIT_ERROR_RULES) {
    if (rule.pattern.test(text)) {
      return rule.kind;
    }
  }
  return null;
}

/**
 * Classify a command result, preferring stderr over stdout
 */
export function classifyResult(result: Pick<GitCommandResult, 'stdout' | 'stderr'>): GitErrorKind | null {
  return classify(result.stderr) ?? classify(result.stdout);
}

/**
 * Every kind whose rule matches the text, in table order
 */
export function matchingKinds(text: string): GitErrorKind[] {
  const kinds: GitErrorKind[] = [];
  for (const rule of GIT_ERROR_RULES) {
    if (rule.pattern.test(text) && !kinds.includes(rule.kind)) {
      kinds.push(rule.kind);
    }
  }
  return kinds;
}

/**
 * Whether a classified kind is one the caller treats as an expected outcome
 */
export function isExpectedError(
  kind: GitErrorKind | null,
  expected: Iterable<GitErrorKind>
): boolean {
  if (kind === null) return false;
  for (const candidate of expected) {
    if (candidate === kind) return true;
  }
  return false;
}
