/**
 * Viewer options: every tunable constant of the classifier, formatter and walker,
 * validated and defaulted in one place.
 */

import { z } from 'zod';
import { OptionsError } from './errors.js';

export const ViewerOptionsSchema = z.object({
  /** Longest value field, in code points, before it is cut */
  maxValueLength: z.number().int().positive().default(128),
  ellipsis: z.string().default('...'),
  /** Values longer than this many bytes are checked for printability */
  binaryLengthThreshold: z.number().int().nonnegative().default(64),
  /** Share of non-printable characters tolerated in a long value */
  maxNonPrintableRatio: z.number().min(0).max(1).default(0),
  /** Deepest sequence nesting accepted */
  maxDepth: z.number().int().positive().default(256),
  /** Depth of the root dataset's records */
  depth: z.number().int().nonnegative().default(0),
  indentWidth: z.number().int().nonnegative().default(2),
  itemIndexBase: z.number().int().nonnegative().default(1),
  /** Drop pixel and waveform rows instead of showing a placeholder */
  omitPixelData: z.boolean().default(false),
});

export type ViewerOptions = z.input<typeof ViewerOptionsSchema>;
export type ResolvedViewerOptions = z.output<typeof ViewerOptionsSchema>;

export const DEFAULT_OPTIONS: ResolvedViewerOptions = Object.freeze(ViewerOptionsSchema.parse({}));

/**
 * Fill in defaults without validating; for the per-element helpers.
 * Keys set to undefined keep their default.
 */
export function withDefaults(options: Partial<ResolvedViewerOptions> = {}): ResolvedViewerOptions {
  const defined = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
  return { ...DEFAULT_OPTIONS, ...defined };
}

/**
 * Validate options and fill in defaults
 */
export function resolveOptions(options: ViewerOptions = {}): ResolvedViewerOptions {
  const result = ViewerOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`
    );
    throw new OptionsError(`Invalid viewer options - ${issues.join('; ')}`, issues);
  }
  return result.data;
}
