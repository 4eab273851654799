import { z } from 'zod';
import { PlanGraphError, ErrorCode } from '../lib/errors.js';

// ── Defaults (centralized) ──

export const OPTION_DEFAULTS = {
  include_in_progress: false,
  include_status: true,
  include_descriptions: true,
} as const;

// ── Per-operation option records ──

export const readyOptionsSchema = z
  .object({
    include_in_progress: z.boolean().default(OPTION_DEFAULTS.include_in_progress),
  })
  .strict();

export const outlineOptionsSchema = z
  .object({
    include_status: z.boolean().default(OPTION_DEFAULTS.include_status),
  })
  .strict();

export const flowchartOptionsSchema = z
  .object({
    include_descriptions: z.boolean().default(OPTION_DEFAULTS.include_descriptions),
  })
  .strict();

export const dotOptionsSchema = flowchartOptionsSchema;

export type ReadyOptions = z.infer<typeof readyOptionsSchema>;
export type OutlineOptions = z.infer<typeof outlineOptionsSchema>;
export type FlowchartOptions = z.infer<typeof flowchartOptionsSchema>;
export type DotOptions = z.infer<typeof dotOptionsSchema>;

// ── Validation ──

/**
 * Check an options record before it reaches the graph.
 * Unknown keys and non-boolean toggles throw INVALID_OPTIONS.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  operation: string,
): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new PlanGraphError(
      ErrorCode.INVALID_OPTIONS,
      `Invalid options for ${operation}: ${detail}`,
      undefined,
      result.error,
    );
  }
  return result.data;
}
