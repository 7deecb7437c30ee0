import type { Graph, NodeLabel } from "./types";

export class GraphBuilder {
  private readonly nodes: NodeLabel[] = [];
  private readonly adjacency = new Map<NodeLabel, NodeLabel[]>();

  addNode(label: NodeLabel): this {
    if (!this.adjacency.has(label)) {
      this.nodes.push(label);
      this.adjacency.set(label, []);
    }
    return this;
  }

  /** Adds `source → target`, and `target → source` too when `undirected` is set. */
  addEdge(source: NodeLabel, target: NodeLabel, undirected = false): this {
    this.addNode(source).addNode(target);
    this.neighboursOf(source).push(target);
    if (undirected) {
      this.neighboursOf(target).push(source);
    }
    return this;
  }

  get edgeCount(): number {
    let count = 0;
    for (const neighbours of this.adjacency.values()) {
      count += neighbours.length;
    }
    return count;
  }

  build(): Graph {
    const adjacency = new Map<NodeLabel, readonly NodeLabel[]>();
    for (const node of this.nodes) {
      adjacency.set(node, [...this.neighboursOf(node)]);
    }
    return { nodes: [...this.nodes], adjacency };
  }

  private neighboursOf(label: NodeLabel): NodeLabel[] {
    const neighbours = this.adjacency.get(label);
    if (!neighbours) {
      throw new Error(`Node ${label} was not registered`);
    }
    return neighbours;
  }
}

export function neighbours(graph: Graph, node: NodeLabel): readonly NodeLabel[] {
  return graph.adjacency.get(node) ?? [];
}

export function degree(graph: Graph, node: NodeLabel): number {
  return neighbours(graph, node).length;
}

export function degreeMap(graph: Graph): Map<NodeLabel, number> {
  return new Map(graph.nodes.map((node) => [node, degree(graph, node)]));
}

export function edgeCount(graph: Graph): number {
  return graph.nodes.reduce((total, node) => total + degree(graph, node), 0);
}

export function hasNode(graph: Graph, node: NodeLabel): boolean {
  return graph.adjacency.has(node);
}

/** Neighbours in both directions, so connectivity ignores how an edge was declared. */
export function undirectedNeighbours(graph: Graph): Map<NodeLabel, NodeLabel[]> {
  const closure = new Map<NodeLabel, NodeLabel[]>(graph.nodes.map((node) => [node, []]));
  for (const source of graph.nodes) {
    for (const target of neighbours(graph, source)) {
      closure.get(source)?.push(target);
      closure.get(target)?.push(source);
    }
  }
  return closure;
}

/**
 * Renders every adjacency entry as a directed `A -> B` pair. Feeding the result back
 * to the parser rebuilds the same adjacency.
 */
export function toEdgeList(graph: Graph): string {
  const edges: string[] = [];
  for (const source of graph.nodes) {
    for (const target of neighbours(graph, source)) {
      edges.push(`${source} -> ${target}`);
    }
  }
  return edges.join(", ");
}
