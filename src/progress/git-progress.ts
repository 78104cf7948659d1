/**
 * Weighted progress from git's stderr progress lines
 *
 * A git operation reports several phases, each going from 0 to 100%. Given
 * the phases expected for an operation and their relative weights, the
 * parser turns each line into an overall percent for the operation.
 */

import { GitReadoutError, ReadoutErrorCode } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { GitParsingResult, GitProgressInfo, ProgressStep } from './types.js';

const PERCENT_RE = /^(\d{1,3})% \((\d+)\/(\d+)\)$/;
const VALUE_ONLY_RE = /^\d+$/;

/**
 * Thrown when a progress parser is built from unusable steps
 */
export class ProgressConfigurationError extends GitReadoutError {
  constructor(message: string) {
    super(message, ReadoutErrorCode.NO_PROGRESS_STEPS);
    this.name = 'ProgressConfigurationError';
  }
}

/**
 * Decode the part of a progress line after its title
 */
function parseProgressText(title: string, progressText: string, line: string): GitProgressInfo | null {
  const parts = progressText
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');
  const [first, ...rest] = parts;
  if (first === undefined) {
    return null;
  }

  let value: number;
  let total: number | undefined;
  let percent: number | undefined;

  const percentMatch = PERCENT_RE.exec(first);
  if (VALUE_ONLY_RE.test(first)) {
    value = parseInt(first, 10);
  } else if (percentMatch !== null) {
    const [, pct = '0', val = '0', tot = '0'] = percentMatch;
    percent = parseInt(pct, 10);
    value = parseInt(val, 10);
    total = parseInt(tot, 10);
  } else {
    return null;
  }

  return {
    title,
    value,
    ...(total !== undefined ? { total } : {}),
    ...(percent !== undefined ? { percent } : {}),
    done: rest.includes('done.'),
    text: line,
  };
}

/**
 * Decode a single progress line
 *
 * Accepts `<title>: <value>` and `<title>: <pct>% (<value>/<total>)`,
 * optionally followed by `, done.`. The title ends at the first `": "`;
 * when the text after it is not progress, later separators are tried so
 * that prefixed titles such as `remote: Compressing objects` decode.
 *
 * @returns null when the line is not a progress line
 */
export function parseProgressLine(line: string): GitProgressInfo | null {
  let titleLength = line.indexOf(': ');

  while (titleLength > 0) {
    const progressText = line.slice(titleLength + 2).trim();
    if (progressText === '') {
      return null;
    }

    const info = parseProgressText(line.slice(0, titleLength), progressText, line);
    if (info !== null) {
      return info;
    }
    titleLength = line.indexOf(': ', titleLength + 2);
  }

  return null;
}

/**
 * Turns one git stderr stream into overall progress
 *
 * Steps must be given in the order git runs them. Some may never be
 * reported (remote compression, for instance), so every step before the
 * one a line reports counts as complete. A line for a step earlier than
 * the last one seen is context. A parser serves exactly one stream.
 */
export class GitProgressParser {
  private readonly steps: readonly ProgressStep[];
  private stepIndex = 0;
  private lastPercent = 0;

  /**
   * @throws ProgressConfigurationError when no steps are given or their weights sum to zero
   */
  constructor(steps: readonly ProgressStep[]) {
    if (steps.length === 0) {
      throw new ProgressConfigurationError('Must specify at least one progress step');
    }

    const totalWeight = steps.reduce((sum, step) => sum + step.weight, 0);
    if (!(totalWeight > 0)) {
      throw new ProgressConfigurationError('Progress step weights must sum to a positive number');
    }

    this.steps = steps.map((step) => ({ title: step.title, weight: step.weight / totalWeight }));
  }

  /**
   * Weights of the configured steps, rescaled to sum to 1
   */
  getSteps(): readonly ProgressStep[] {
    return this.steps;
  }

  parse(line: string): GitParsingResult {
    const progress = parseProgressLine(line);
    if (progress === null) {
      return this.context(line);
    }

    let accumulated = 0;
    for (let index = 0; index < this.steps.length; index++) {
      const step = this.steps[index];
      if (step === undefined) continue;

      if (index >= this.stepIndex && progress.title === step.title) {
        if (progress.total !== undefined && progress.total > 0) {
          accumulated += (step.weight * progress.value) / progress.total;
        }

        this.stepIndex = index;
        this.lastPercent = Math.max(this.lastPercent, Math.round(accumulated * 100));

        return { kind: 'progress', percent: this.lastPercent, details: progress };
      } else {
        accumulated += step.weight;
      }
    }

    getLogger().debug({ component: 'progress', title: progress.title }, 'Progress line matched no step');
    return this.context(line);
  }

  private context(text: string): GitParsingResult {
    return { kind: 'context', percent: this.lastPercent, text };
  }
}
