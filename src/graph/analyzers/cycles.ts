import { neighbours } from "../graph";
import type { CycleDetectionResult, Graph, NodeLabel } from "../types";

interface CycleFrame {
  node: NodeLabel;
  path: NodeLabel[];
  nextIndex: number;
}

/**
 * Depth-first search with an explicit recursion stack. Reaching a node that is still
 * on the stack records the stack slice from that node to the current one.
 *
 * This is a best-effort detector, not a cycle basis: cycles sharing a segment are all
 * reported, and on a symmetrised (undirected) graph every edge shows up as a
 * two-node cycle.
 */
export function detectCycles(graph: Graph): CycleDetectionResult {
  const visited = new Set<NodeLabel>();
  const onStack = new Set<NodeLabel>();
  const cycles: NodeLabel[][] = [];
  const stack: CycleFrame[] = [];

  const enter = (node: NodeLabel, parentPath: NodeLabel[]) => {
    if (onStack.has(node)) {
      cycles.push(parentPath.slice(parentPath.indexOf(node)));
      return;
    }
    if (visited.has(node)) return;
    visited.add(node);
    onStack.add(node);
    stack.push({ node, path: [...parentPath, node], nextIndex: 0 });
  };

  for (const root of graph.nodes) {
    enter(root, []);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const next = neighbours(graph, frame.node);
      if (frame.nextIndex < next.length) {
        enter(next[frame.nextIndex++], frame.path);
      } else {
        stack.pop();
        onStack.delete(frame.node);
      }
    }
  }

  return { cycles };
}
