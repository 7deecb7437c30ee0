import { GraphBuilder } from "./graph";
import type { Graph } from "./types";

/** Deterministic linear congruential generator returning values in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

export function pick(random: () => number, bound: number): number {
  return Math.floor(random() * bound);
}

export function labels(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `N${index}`);
}

export interface RandomGraphOptions {
  nodeCount: number;
  edgeCount: number;
  undirected?: boolean;
}

export function randomGraph(
  random: () => number,
  { nodeCount, edgeCount, undirected = false }: RandomGraphOptions,
): Graph {
  const nodes = labels(nodeCount);
  const builder = new GraphBuilder();
  nodes.forEach((node) => builder.addNode(node));
  for (let i = 0; i < edgeCount; i++) {
    builder.addEdge(nodes[pick(random, nodeCount)], nodes[pick(random, nodeCount)], undirected);
  }
  return builder.build();
}

/** Reference breadth-first distances, used to check the analyzers. */
export function bfsDistances(graph: Graph, start: string): Map<string, number> {
  const distances = new Map<string, number>([[start, 0]]);
  const queue = [start];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    for (const next of graph.adjacency.get(node) ?? []) {
      if (distances.has(next)) continue;
      distances.set(next, (distances.get(node) ?? 0) + 1);
      queue.push(next);
    }
  }
  return distances;
}

export function hasEdge(graph: Graph, source: string, target: string): boolean {
  return (graph.adjacency.get(source) ?? []).includes(target);
}
