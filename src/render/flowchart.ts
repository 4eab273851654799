import type { z } from 'zod';
import { flowchartOptionsSchema, parseOptions } from '../config/options.js';
import type { DependencyGraph, EdgeKind } from '../graph/graph.js';

const ARROWS: Record<EdgeKind, string> = {
  component_of: '-->',
  depends_on: '-.->',
};

/** Mermaid ids are bare words; these ones open a statement of their own */
const RESERVED_IDS = new Set([
  'end',
  'graph',
  'flowchart',
  'subgraph',
  'direction',
  'style',
  'linkStyle',
  'classDef',
  'class',
  'click',
]);

function isPlainMermaidId(id: string): boolean {
  return /^[A-Za-z0-9_]+$/.test(id) && !RESERVED_IDS.has(id);
}

function quoteLabel(text: string): string {
  return `"${text.replaceAll('"', '#quot;')}"`;
}

/**
 * Gives every id that cannot be written bare an alias `n1`, `n2`, ...,
 * skipping aliases that are themselves ids in the graph.
 */
function createAliases(graph: DependencyGraph): Map<string, string> {
  const ids = new Set<string>();
  for (const node of graph.allNodes()) ids.add(node.id);
  for (const edge of graph.allEdges()) {
    ids.add(edge.from);
    ids.add(edge.to);
  }

  const aliases = new Map<string, string>();
  let counter = 0;
  for (const id of ids) {
    if (isPlainMermaidId(id)) continue;
    let alias: string;
    do {
      counter += 1;
      alias = `n${counter}`;
    } while (ids.has(alias));
    aliases.set(id, alias);
  }
  return aliases;
}

function endpoint(graph: DependencyGraph, aliases: Map<string, string>, id: string, withLabel: boolean): string {
  const node = graph.getNode(id);
  const label = withLabel && node ? node.description : id;
  const alias = aliases.get(id);
  if (alias !== undefined) return `${alias}[${quoteLabel(label)}]`;
  return withLabel && node ? `${id}[${quoteLabel(label)}]` : id;
}

/**
 * Render every edge as a Mermaid flowchart line; dependencies get a dotted arrow.
 * Ids that Mermaid would misread are written under an alias labelled with the id.
 */
export function renderFlowchart(
  graph: DependencyGraph,
  options: z.input<typeof flowchartOptionsSchema> = {},
): string {
  const { include_descriptions } = parseOptions(flowchartOptionsSchema, options, 'flowchart');
  const aliases = createAliases(graph);

  const lines = ['graph TD'];
  for (const edge of graph.allEdges()) {
    const from = endpoint(graph, aliases, edge.from, include_descriptions);
    const to = endpoint(graph, aliases, edge.to, include_descriptions);
    lines.push(`    ${from} ${ARROWS[edge.kind]} ${to}`);
  }

  return lines.join('\n');
}
