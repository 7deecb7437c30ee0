import { undirectedNeighbours } from "../graph";
import type { ConnectivityResult, Graph, NodeLabel } from "../types";

/**
 * Components under the undirected closure, in discovery order. Each component lists
 * nodes in the order an iterative depth-first walk reaches them.
 */
export function connectivity(graph: Graph): ConnectivityResult {
  const closure = undirectedNeighbours(graph);
  const visited = new Set<NodeLabel>();
  const components: NodeLabel[][] = [];

  for (const root of graph.nodes) {
    if (visited.has(root)) continue;

    const component: NodeLabel[] = [];
    const stack: NodeLabel[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined || visited.has(node)) continue;
      visited.add(node);
      component.push(node);

      const next = closure.get(node) ?? [];
      // reversed so the first-listed neighbour is popped first
      for (let i = next.length - 1; i >= 0; i--) {
        if (!visited.has(next[i])) stack.push(next[i]);
      }
    }
    components.push(component);
  }

  return { connected: components.length === 1, components };
}
