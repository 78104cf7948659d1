/**
 * Runtime validation of serialized diffs
 */

import { z } from 'zod';

export const DiffLineSchema = z.object({
  text: z.string(),
  type: z.enum(['context', 'add', 'delete', 'hunk']),
  oldLineNumber: z.number().int().nullable().default(null),
  newLineNumber: z.number().int().nullable().default(null),
  noTrailingNewLine: z.boolean().default(false),
});

export const DiffHunkHeaderSchema = z.object({
  oldStartLine: z.number().int().min(0),
  oldLineCount: z.number().int().min(0),
  newStartLine: z.number().int().min(0),
  newLineCount: z.number().int().min(0),
  sectionHeading: z.string().optional(),
});

export const DiffHunkSchema = z.object({
  header: DiffHunkHeaderSchema,
  lines: z.array(DiffLineSchema),
  unifiedDiffStart: z.number().int().min(0),
  unifiedDiffEnd: z.number().int().min(0),
});

export const TextDiffSchema = z.object({
  text: z.string().optional(),
  hunks: z.array(DiffHunkSchema),
});

/**
 * A file's diff plus the unified-diff line indices chosen by the user
 */
export const PatchRequestSchema = z.object({
  path: z.string().min(1),
  status: z.enum(['new', 'modified', 'deleted', 'untracked', 'renamed', 'copied']).default('modified'),
  oldPath: z.string().optional(),
  diff: TextDiffSchema,
  selectedLines: z.array(z.number().int().min(0)).default([]),
});

export type PatchRequest = z.infer<typeof PatchRequestSchema>;
