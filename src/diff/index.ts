/**
 * Diff model, line selection and partial patch reconstruction
 */

export * from './types.js';
export { DiffSelection, getSelectableLines } from './selection.js';
export {
  EmptyPatchError,
  formatPatch,
  formatPatchHeader,
  formatPatchHeaderForFile,
  formatPatchToDiscardChanges,
  formatHunkHeader,
} from './patch.js';
export {
  DiffLineSchema,
  DiffHunkHeaderSchema,
  DiffHunkSchema,
  TextDiffSchema,
  PatchRequestSchema,
  type PatchRequest,
} from './schema.js';
