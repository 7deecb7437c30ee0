import { InvalidNodeError, type EndpointRole } from "../errors";
import { hasNode, neighbours } from "../graph";
import type { Graph, NodeLabel } from "../types";

export const DEFAULT_MAX_PATHS = 10;

function assertNode(graph: Graph, role: EndpointRole, label: NodeLabel): void {
  if (!hasNode(graph, label)) {
    throw new InvalidNodeError(role, label, graph.nodes);
  }
}

/**
 * Breadth-first search expanding neighbours in insertion order. Returns the first
 * path found to `end`, which has the fewest edges, or `null` when unreachable.
 */
export function shortestPath(graph: Graph, start: NodeLabel, end: NodeLabel): NodeLabel[] | null {
  assertNode(graph, "start", start);
  assertNode(graph, "end", end);
  if (start === end) return [start];

  const visited = new Set<NodeLabel>([start]);
  const queue: NodeLabel[][] = [[start]];

  for (let head = 0; head < queue.length; head++) {
    const path = queue[head];
    for (const neighbour of neighbours(graph, path[path.length - 1])) {
      if (neighbour === end) return [...path, neighbour];
      if (visited.has(neighbour)) continue;
      visited.add(neighbour);
      queue.push([...path, neighbour]);
    }
  }

  return null;
}

interface PathFrame {
  node: NodeLabel;
  path: NodeLabel[];
  visited: ReadonlySet<NodeLabel>;
}

/**
 * Simple paths from `start` to `end`, depth-first in adjacency order, stopping once
 * `maxPaths` have been collected.
 */
export function allPaths(
  graph: Graph,
  start: NodeLabel,
  end: NodeLabel,
  maxPaths: number = DEFAULT_MAX_PATHS,
): NodeLabel[][] {
  assertNode(graph, "start", start);
  assertNode(graph, "end", end);

  const found: NodeLabel[][] = [];
  const stack: PathFrame[] = [{ node: start, path: [start], visited: new Set([start]) }];

  while (stack.length > 0 && found.length < maxPaths) {
    const frame = stack.pop();
    if (!frame) break;

    if (frame.node === end) {
      found.push(frame.path);
      continue;
    }

    const next = neighbours(graph, frame.node);
    for (let i = next.length - 1; i >= 0; i--) {
      const neighbour = next[i];
      if (frame.visited.has(neighbour)) continue;
      stack.push({
        node: neighbour,
        path: [...frame.path, neighbour],
        visited: new Set(frame.visited).add(neighbour),
      });
    }
  }

  return found;
}
