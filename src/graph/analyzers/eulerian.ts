import { degree } from "../graph";
import type { EulerianResult, Graph } from "../types";
import { connectivity } from "./connectivity";

/**
 * Euler's theorem over the parsed adjacency: connected with no odd-degree node gives
 * a circuit, connected with exactly two gives a trail between them.
 */
export function eulerian(graph: Graph): EulerianResult {
  const oddDegreeNodes = graph.nodes.filter((node) => degree(graph, node) % 2 === 1);
  const { connected } = connectivity(graph);

  if (connected && oddDegreeNodes.length === 0) {
    return { kind: "cycle", requiredEndpoints: null, oddDegreeNodes, connected };
  }
  if (connected && oddDegreeNodes.length === 2) {
    const [first, second] = oddDegreeNodes;
    return { kind: "path", requiredEndpoints: [first, second], oddDegreeNodes, connected };
  }
  return { kind: "none", requiredEndpoints: null, oddDegreeNodes, connected };
}
