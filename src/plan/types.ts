import { z } from 'zod';

// ── Reusable primitives ──

export const STATUSES = ['pending', 'in_progress', 'complete'] as const;

export const statusSchema = z.enum(STATUSES);

/** Integer literal as written in the document: optional sign, decimal digits */
const integerText = z
  .string()
  .regex(/^\s*[+-]?\d+\s*$/, 'must be an integer')
  .transform((text) => Number.parseInt(text, 10))
  .refine(Number.isSafeInteger, 'must be within the safe integer range');

// ── Per-element field schemas ──

/** Fields every level shares. Any failure here drops the element. */
export const nodeFieldsSchema = z.object({
  id: z.string().min(1, 'id must not be empty'),
  description: z.string(),
  status: statusSchema,
  priority: integerText,
});

export const storyFieldsSchema = nodeFieldsSchema.extend({
  points: integerText,
});

// ── Derived TypeScript types ──

export type Status = z.infer<typeof statusSchema>;

interface NodeFields {
  readonly id: string;
  readonly description: string;
  readonly status: Status;
  readonly priority: number;
}

export interface TaskNode extends NodeFields {
  readonly kind: 'task';
  /** Ids this task waits on, in document order. May name ids absent from the plan. */
  readonly depends_on: readonly string[];
}

export interface StoryNode extends NodeFields {
  readonly kind: 'story';
  readonly points: number;
  readonly tasks: readonly TaskNode[];
}

export interface EpicNode extends NodeFields {
  readonly kind: 'epic';
  readonly stories: readonly StoryNode[];
}

export type PlanNode = TaskNode | StoryNode | EpicNode;

export type NodeKind = PlanNode['kind'];

export interface Plan {
  readonly version: string;
  readonly epics: readonly EpicNode[];
}

// ── Defaults (centralized) ──

export const FIELD_DEFAULTS = {
  description: '',
  priority: '1',
  points: '0',
} as const;
