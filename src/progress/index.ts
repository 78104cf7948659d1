/**
 * Progress decoding for git, Git LFS and multi-commit operations
 */

export * from './types.js';
export { GitProgressParser, ProgressConfigurationError, parseProgressLine } from './git-progress.js';
export {
  PROGRESS_STEPS,
  PROGRESS_PRESETS,
  createProgressParser,
  isProgressPreset,
  type ProgressPreset,
} from './steps.js';
export { LfsProgressParser } from './lfs.js';
export { RebaseProgressParser, CherryPickProgressParser, formatRebaseValue } from './multi-commit.js';
export { ProgressSession, type ProgressSessionOptions } from './session.js';
