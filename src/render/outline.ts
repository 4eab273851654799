import type { z } from 'zod';
import { outlineOptionsSchema, parseOptions } from '../config/options.js';
import type { DependencyGraph } from '../graph/graph.js';

/**
 * Render the containment hierarchy as a nested bullet list.
 *
 * Roots are nodes with no outgoing `component_of` edge. Children are reached
 * through incoming `component_of` edges, depth first, each node printed once.
 *
 *   - E1: Core models (in_progress)
 *     - S1: Base classes (complete)
 *       - T1: Task model (complete)
 */
export function renderOutline(
  graph: DependencyGraph,
  options: z.input<typeof outlineOptionsSchema> = {},
): string {
  const { include_status } = parseOptions(outlineOptionsSchema, options, 'outline');

  const roots = graph
    .allNodes()
    .filter((node) => graph.successors(node.id, 'component_of').length === 0)
    .map((node) => node.id);

  const lines: string[] = [];
  const visited = new Set<string>();
  const stack: Array<{ id: string; depth: number }> = [];

  for (const root of roots) {
    stack.push({ id: root, depth: 0 });

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry || visited.has(entry.id)) continue;
      visited.add(entry.id);

      const node = graph.getNode(entry.id);
      if (!node) continue;

      const line = `${'  '.repeat(entry.depth)}- ${node.id}: ${node.description}`;
      lines.push(include_status ? `${line} (${node.status})` : line);

      // Reversed so the first child is popped first
      const children = graph.predecessors(node.id, 'component_of');
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child !== undefined && !visited.has(child)) {
          stack.push({ id: child, depth: entry.depth + 1 });
        }
      }
    }
  }

  return lines.join('\n');
}
