import type { z } from 'zod';
import { dotOptionsSchema, parseOptions } from '../config/options.js';
import type { DependencyGraph } from '../graph/graph.js';

/** Quote a DOT string, escaping backslashes and double quotes */
export function quoteDot(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Render the graph as Graphviz DOT, one statement per edge.
 * Dependency edges are dashed; with descriptions, the endpoints' descriptions
 * are attached as tail and head labels.
 */
export function renderDot(
  graph: DependencyGraph,
  options: z.input<typeof dotOptionsSchema> = {},
): string {
  const { include_descriptions } = parseOptions(dotOptionsSchema, options, 'dot');

  const lines = ['digraph {'];
  for (const edge of graph.allEdges()) {
    const attrs: string[] = [];
    if (edge.kind === 'depends_on') attrs.push('style=dashed');

    if (include_descriptions) {
      const tail = graph.getNode(edge.from);
      const head = graph.getNode(edge.to);
      if (tail) attrs.push(`taillabel=${quoteDot(tail.description)}`);
      if (head) attrs.push(`headlabel=${quoteDot(head.description)}`);
    }

    const statement = `${quoteDot(edge.from)} -> ${quoteDot(edge.to)}`;
    lines.push(attrs.length > 0 ? `    ${statement} [${attrs.join(', ')}]` : `    ${statement}`);
  }
  lines.push('}');

  return lines.join('\n');
}
