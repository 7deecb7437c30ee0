import { degreeMap, edgeCount, toEdgeList } from "./graph";
import type {
  AnalysisResult,
  ConnectivityResult,
  CycleDetectionResult,
  EulerianResult,
  Graph,
  GridAdvisory,
  NodeLabel,
  PathAnalysisResult,
} from "./types";

export const DEFAULT_CYCLE_DISPLAY_LIMIT = 5;

const UNKNOWN = "unknown";

export interface ReportOptions {
  cycleDisplayLimit?: number;
}

function heading(title: string, width: number): string[] {
  return [title, "-".repeat(width)];
}

function header(analysisType: string): string[] {
  return [`Graph Traversal Analysis: ${analysisType || UNKNOWN}`, "=".repeat(50)];
}

function listOf(items: readonly NodeLabel[] | null | undefined): string {
  if (!Array.isArray(items)) return UNKNOWN;
  return items.length > 0 ? items.join(", ") : "none";
}

function route(path: readonly NodeLabel[]): string {
  return path.join(" → ");
}

function edges(count: number): string {
  return `${count} edge${count === 1 ? "" : "s"}`;
}

function structureLines(graph: Graph): string[] {
  const degrees = [...degreeMap(graph)].map(([node, value]) => `${node}=${value}`);
  return [
    ...heading("GRAPH STRUCTURE:", 15),
    `Nodes: ${listOf(graph.nodes)}`,
    `Total nodes: ${graph.nodes.length}`,
    `Total edges: ${edgeCount(graph)}`,
    `Edges: ${toEdgeList(graph) || "none"}`,
    `Node degrees: ${degrees.join(", ") || "none"}`,
  ];
}

function connectedLine(connected: boolean | undefined): string {
  if (connected === undefined) return `Connectivity: ${UNKNOWN}`;
  return connected ? "✓ Graph is connected" : "✗ Graph is not connected";
}

function eulerianLines(result: EulerianResult): string[] {
  const odd = result.oddDegreeNodes;
  const lines = [
    ...heading("EULERIAN PATH ANALYSIS:", 22),
    `Odd degree nodes: ${listOf(odd)} (count: ${Array.isArray(odd) ? odd.length : UNKNOWN})`,
  ];

  switch (result.kind) {
    case "cycle":
      lines.push("✓ Eulerian CYCLE exists (all nodes have even degree)", "→ Can start and end at same node");
      break;
    case "path": {
      const [from, to] = result.requiredEndpoints ?? [UNKNOWN, UNKNOWN];
      lines.push(
        "✓ Eulerian PATH exists (exactly 2 nodes have odd degree)",
        `→ Must start at ${from} and end at ${to} (or vice versa)`,
      );
      break;
    }
    case "none":
      if (result.connected === false) {
        lines.push("✗ No Eulerian path exists (graph is not connected)");
      } else {
        lines.push("✗ No Eulerian path exists (not 0 or 2 odd-degree nodes)");
      }
      lines.push("→ Impossible to traverse all edges exactly once");
      break;
    default:
      lines.push(`Eulerian classification: ${UNKNOWN}`);
  }

  lines.push(connectedLine(result.connected));
  return lines;
}

function connectivityLines(result: ConnectivityResult): string[] {
  const components = Array.isArray(result.components) ? result.components : [];
  return [
    ...heading("CONNECTIVITY ANALYSIS:", 20),
    connectedLine(result.connected),
    `Number of components: ${Array.isArray(result.components) ? components.length : UNKNOWN}`,
    ...components.map((component, index) => `  Component ${index + 1}: ${listOf(component)}`),
  ];
}

function pathLines(result: PathAnalysisResult): string[] {
  const lines = heading(`PATH ANALYSIS: ${result.start || UNKNOWN} → ${result.end || UNKNOWN}`, 30);

  if (result.shortestPath === undefined) {
    lines.push(`Shortest path: ${UNKNOWN}`);
  } else if (result.shortestPath === null) {
    lines.push(`No path exists between ${result.start} and ${result.end}`);
  } else {
    lines.push(
      `Shortest path: ${route(result.shortestPath)}`,
      `Path length: ${edges(result.shortestPath.length - 1)}`,
    );
  }

  const found = Array.isArray(result.allPaths) ? result.allPaths : [];
  if (found.length > 0) {
    lines.push("", `All paths (max ${result.maxPaths ?? UNKNOWN}):`);
    found.forEach((path, index) => lines.push(`  ${index + 1}. ${route(path)}`));
  }
  return lines;
}

function cycleLines(result: CycleDetectionResult, displayLimit: number): string[] {
  const lines = heading("CYCLE DETECTION:", 15);
  if (!Array.isArray(result.cycles)) {
    lines.push(`Cycles found: ${UNKNOWN}`);
    return lines;
  }
  if (result.cycles.length === 0) {
    lines.push("No cycles detected (graph is acyclic)");
    return lines;
  }

  lines.push(`Cycles found: ${result.cycles.length}`);
  result.cycles
    .slice(0, displayLimit)
    .forEach((cycle, index) => lines.push(`  ${index + 1}. ${route([...cycle, cycle[0]])}`));
  const hidden = result.cycles.length - displayLimit;
  if (hidden > 0) {
    lines.push(`  ... ${hidden} more not shown`);
  }
  return lines;
}

function detailLines(result: AnalysisResult | undefined, options: ReportOptions): string[] {
  if (!result) return [`Analysis result: ${UNKNOWN}`];

  switch (result.type) {
    case "eulerian_path":
      return eulerianLines(result.eulerian);
    case "connectivity":
      return connectivityLines(result.connectivity);
    case "path_analysis":
      return pathLines(result.paths);
    case "cycle_detection":
      return cycleLines(result.cycles, options.cycleDisplayLimit ?? DEFAULT_CYCLE_DISPLAY_LIMIT);
    default:
      return [`Analysis result: ${UNKNOWN}`];
  }
}

/**
 * Renders one analysis as a plain-text report: header, graph structure, then the
 * analysis-specific section. Never throws; absent fields print as "unknown".
 */
export function formatReport(
  analysisType: string,
  graph: Graph,
  result: AnalysisResult | undefined,
  options: ReportOptions = {},
): string {
  return [...header(analysisType), ...structureLines(graph), "", ...detailLines(result, options)].join("\n");
}

export function formatGridAdvisory(analysisType: string, advisory: GridAdvisory): string {
  const lines = [
    ...header(analysisType),
    ...heading("GRID-BASED GRAPH DETECTED:", 25),
    `Grid elements found: ${advisory.referenceCount} color/ownership references`,
    "Advisory only: no graph was reconstructed from the grid description.",
    "",
  ];

  if (analysisType !== "eulerian_path") {
    lines.push(
      `${analysisType || UNKNOWN} is not applicable to a grid description; describe the graph as an edge list or adjacency mapping.`,
    );
    return lines.join("\n");
  }

  lines.push(
    ...heading("EULERIAN PATH ANALYSIS:", 22),
    "For a grid traversal to be possible without backtracking:",
    "1. The graph must have exactly 0 or 2 vertices with odd degree",
    "2. All owned cells must be connected",
    "3. With 2 odd-degree vertices, the walk must start at one and end at the other",
  );

  if (advisory.asksForTraversal) {
    lines.push(
      "",
      "SIMPLIFIED ASSESSMENT:",
      "- This appears to be an Eulerian path problem on a grid",
      "- Need to check if owned cells form a connected graph",
      "- Count vertices with odd degree (corner/edge pieces)",
      "- Path exists if ≤2 vertices have odd degree",
    );
    if (advisory.mentionsCornersOrEdges) {
      lines.push("- Detected corner/edge references - likely affects degree count");
    }
  }

  return lines.join("\n");
}
