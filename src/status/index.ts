/**
 * Porcelain v2 status decoding
 */

export * from './types.js';
export {
  parsePorcelainStatus,
  parseChangedEntry,
  parseRenamedOrCopiedEntry,
  parseUnmergedEntry,
  parseUntrackedEntry,
} from './parser.js';
export { mapStatus, mapSubmoduleStatus, CONFLICT_STATUS_CODES } from './map-status.js';
export { parseStatusHeader, parseStatusHeaders } from './headers.js';
export { parseConflictMarkerCounts } from './conflict-markers.js';
export {
  convertToAppStatus,
  buildStatusMap,
  parseStatus,
  isTextConflictEntry,
  NO_CONFLICT_DETAILS,
} from './app-status.js';
