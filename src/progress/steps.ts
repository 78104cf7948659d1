/**
 * Progress steps for common git operations
 */

import { GitProgressParser } from './git-progress.js';
import type { ProgressStep } from './types.js';

export type ProgressPreset = 'clone' | 'fetch' | 'pull' | 'push' | 'checkout' | 'revert';

export const PROGRESS_STEPS: Readonly<Record<ProgressPreset, readonly ProgressStep[]>> = {
  clone: [
    { title: 'remote: Compressing objects', weight: 0.1 },
    { title: 'Receiving objects', weight: 0.6 },
    { title: 'Resolving deltas', weight: 0.1 },
    { title: 'Checking out files', weight: 0.2 },
  ],
  fetch: [
    { title: 'remote: Compressing objects', weight: 0.1 },
    { title: 'Receiving objects', weight: 0.7 },
    { title: 'Resolving deltas', weight: 0.2 },
  ],
  pull: [
    { title: 'remote: Compressing objects', weight: 0.1 },
    { title: 'Receiving objects', weight: 0.7 },
    { title: 'Resolving deltas', weight: 0.15 },
    { title: 'Checking out files', weight: 0.15 },
  ],
  push: [
    { title: 'Compressing objects', weight: 0.2 },
    { title: 'Writing objects', weight: 0.7 },
    { title: 'remote: Resolving deltas', weight: 0.1 },
  ],
  checkout: [{ title: 'Checking out files', weight: 1 }],
  // Revert prints no phased progress; every line is context
  revert: [{ title: '', weight: 1 }],
};

export const PROGRESS_PRESETS: readonly ProgressPreset[] = [
  'clone',
  'fetch',
  'pull',
  'push',
  'checkout',
  'revert',
];

export function isProgressPreset(name: string): name is ProgressPreset {
  return Object.hasOwn(PROGRESS_STEPS, name);
}

/**
 * Create a parser for one of the preset operations
 */
export function createProgressParser(preset: ProgressPreset): GitProgressParser {
  return new GitProgressParser(PROGRESS_STEPS[preset]);
}
