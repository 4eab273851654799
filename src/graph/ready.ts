import type { z } from 'zod';
import { readyOptionsSchema, parseOptions } from '../config/options.js';
import type { DependencyGraph } from './graph.js';

/**
 * Ids of tasks that can be started now, in graph node order.
 *
 * A task is ready when it is not complete (in-progress tasks only with
 * `include_in_progress`) and every direct `depends_on` target is a complete
 * node. A target that is not in the graph counts as unmet. Dependencies of
 * dependencies are not examined.
 */
export function findReadyTasks(
  graph: DependencyGraph,
  options: z.input<typeof readyOptionsSchema> = {},
): string[] {
  const { include_in_progress } = parseOptions(readyOptionsSchema, options, 'ready tasks');

  const ready: string[] = [];
  for (const node of graph.allNodes()) {
    if (node.kind !== 'task') continue;
    if (node.status === 'complete') continue;
    if (node.status === 'in_progress' && !include_in_progress) continue;

    const depsMet = graph
      .successors(node.id, 'depends_on')
      .every((dep) => graph.getNode(dep)?.status === 'complete');

    if (depsMet) ready.push(node.id);
  }

  return ready;
}

