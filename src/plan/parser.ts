import type { ZodError } from 'zod';
import { debug } from '../lib/utils/debug.js';
import type { EpicElement, PlanDocument, StoryElement, TaskElement } from './schema.js';
import {
  nodeFieldsSchema,
  storyFieldsSchema,
  FIELD_DEFAULTS,
  type EpicNode,
  type NodeKind,
  type Plan,
  type StoryNode,
  type TaskNode,
} from './types.js';

// ── Drop reporting ──

function logDropped(kind: NodeKind, id: string, error: ZodError): void {
  const reasons = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  debug('parser', `dropped ${kind} "${id}" (${reasons.join('; ')})`);
}

// ── Dependencies ──

/** The task's dependency ids in document order, blanks skipped */
export function collectDependencies(element: TaskElement): string[] {
  return element.depends_on.filter((dep) => dep !== '');
}

// ── Element parsers ──
//
// Each returns null when the element fails its field checks. The caller
// skips it, which also discards everything nested under it.

export function parseTask(element: TaskElement): TaskNode | null {
  const result = nodeFieldsSchema.safeParse({
    id: element['@_id'],
    status: element['@_status'],
    description: element.description ?? FIELD_DEFAULTS.description,
    priority: element.priority ?? FIELD_DEFAULTS.priority,
  });
  if (!result.success) {
    logDropped('task', element['@_id'], result.error);
    return null;
  }

  return Object.freeze({
    kind: 'task',
    ...result.data,
    depends_on: Object.freeze(collectDependencies(element)),
  });
}

export function parseStory(element: StoryElement): StoryNode | null {
  const result = storyFieldsSchema.safeParse({
    id: element['@_id'],
    status: element['@_status'],
    description: element.description ?? FIELD_DEFAULTS.description,
    priority: element.priority ?? FIELD_DEFAULTS.priority,
    points: element.points ?? FIELD_DEFAULTS.points,
  });
  if (!result.success) {
    logDropped('story', element['@_id'], result.error);
    return null;
  }

  const tasks: TaskNode[] = [];
  for (const taskElement of element.task ?? []) {
    const task = parseTask(taskElement);
    if (task) tasks.push(task);
  }

  return Object.freeze({
    kind: 'story',
    ...result.data,
    tasks: Object.freeze(tasks),
  });
}

export function parseEpic(element: EpicElement): EpicNode | null {
  const result = nodeFieldsSchema.safeParse({
    id: element['@_id'],
    status: element['@_status'],
    description: element.description ?? FIELD_DEFAULTS.description,
    priority: element.priority ?? FIELD_DEFAULTS.priority,
  });
  if (!result.success) {
    logDropped('epic', element['@_id'], result.error);
    return null;
  }

  const stories: StoryNode[] = [];
  for (const storyElement of element.story ?? []) {
    const story = parseStory(storyElement);
    if (story) stories.push(story);
  }

  return Object.freeze({
    kind: 'epic',
    ...result.data,
    stories: Object.freeze(stories),
  });
}

// ── Public API ──

/**
 * Turn a schema-valid document into a Plan.
 * Elements that fail their field checks are dropped silently (see debug output
 * under the `parser` namespace); this never throws for per-element problems.
 */
export function parsePlanDocument(document: PlanDocument): Plan {
  const epics: EpicNode[] = [];
  for (const epicElement of document.plan.epic ?? []) {
    const epic = parseEpic(epicElement);
    if (epic) epics.push(epic);
  }

  return Object.freeze({
    version: document.plan['@_version'],
    epics: Object.freeze(epics),
  });
}
