import type { PlanNode } from '../plan/types.js';

// ── Types ──

/** `component_of` runs child → parent; `depends_on` runs task → dependency */
export type EdgeKind = 'component_of' | 'depends_on';

export interface Edge {
  readonly from: string;
  readonly to: string;
  readonly kind: EdgeKind;
}

function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

// ── Graph ──

/**
 * Directed plan graph: an arena of nodes keyed by id plus per-kind adjacency.
 *
 * Edge targets are not required to be nodes; a `depends_on` edge may point at
 * an id the plan never defined. Each (from, to) pair holds one edge at most,
 * and re-adding a pair replaces its kind in place.
 */
export class DependencyGraph {
  private readonly nodes = new Map<string, PlanNode>();
  private readonly edges = new Map<string, Edge>();
  private readonly outgoing = new Map<string, Map<string, EdgeKind>>();
  private readonly incoming = new Map<string, Map<string, EdgeKind>>();

  addNode(node: PlanNode): void {
    this.nodes.set(node.id, node);
  }

  addEdge(from: string, to: string, kind: EdgeKind): void {
    this.edges.set(edgeKey(from, to), { from, to, kind });
    adjacency(this.outgoing, from).set(to, kind);
    adjacency(this.incoming, to).set(from, kind);
  }

  getNode(id: string): PlanNode | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getEdge(from: string, to: string): Edge | undefined {
    return this.edges.get(edgeKey(from, to));
  }

  /** Nodes in insertion order */
  allNodes(): PlanNode[] {
    return [...this.nodes.values()];
  }

  /** Edges in insertion order */
  allEdges(): Edge[] {
    return [...this.edges.values()];
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  /** Ids this node points at through edges of the given kind */
  successors(id: string, kind: EdgeKind): string[] {
    return selectByKind(this.outgoing.get(id), kind);
  }

  /** Ids pointing at this node through edges of the given kind */
  predecessors(id: string, kind: EdgeKind): string[] {
    return selectByKind(this.incoming.get(id), kind);
  }
}

// ── Helpers ──

function adjacency(index: Map<string, Map<string, EdgeKind>>, id: string): Map<string, EdgeKind> {
  let entry = index.get(id);
  if (!entry) {
    entry = new Map();
    index.set(id, entry);
  }
  return entry;
}

function selectByKind(entries: Map<string, EdgeKind> | undefined, kind: EdgeKind): string[] {
  if (!entries) return [];
  const ids: string[] = [];
  for (const [id, edgeKind] of entries) {
    if (edgeKind === kind) ids.push(id);
  }
  return ids;
}
