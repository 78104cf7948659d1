/**
 * Git failure classification
 */

export * from './types.js';
export { GIT_ERROR_RULES } from './rules.js';
export { classify, classifyResult, matchingKinds, isExpectedError } from './classifier.js';
export { describe } from './descriptions.js';
export { getOversizedFiles } from './oversized.js';
export { GitCommandError, checkGitResult, type CheckResultOptions } from './command-error.js';
