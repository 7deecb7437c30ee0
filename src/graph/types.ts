export type NodeLabel = string;

/**
 * Canonical graph produced by the parser.
 *
 * `nodes` keeps first-seen order. Each adjacency list keeps insertion order and may
 * repeat a neighbour (parallel edges), which counts towards degree.
 */
export interface Graph {
  readonly nodes: readonly NodeLabel[];
  readonly adjacency: ReadonlyMap<NodeLabel, readonly NodeLabel[]>;
}

export interface ConnectivityResult {
  connected: boolean;
  components: NodeLabel[][];
}

export type EulerianKind = "cycle" | "path" | "none";

export interface EulerianResult {
  kind: EulerianKind;
  requiredEndpoints: [NodeLabel, NodeLabel] | null;
  oddDegreeNodes: NodeLabel[];
  connected: boolean;
}

export interface PathAnalysisResult {
  start: NodeLabel;
  end: NodeLabel;
  shortestPath: NodeLabel[] | null;
  allPaths: NodeLabel[][];
  maxPaths: number;
}

export interface CycleDetectionResult {
  cycles: NodeLabel[][];
}

export type AnalysisResult =
  | { type: "connectivity"; connectivity: ConnectivityResult }
  | { type: "eulerian_path"; eulerian: EulerianResult }
  | { type: "path_analysis"; paths: PathAnalysisResult }
  | { type: "cycle_detection"; cycles: CycleDetectionResult };

/** Findings for grid/ownership puzzles that name cells instead of edges. */
export interface GridAdvisory {
  referenceCount: number;
  asksForTraversal: boolean;
  mentionsCornersOrEdges: boolean;
}

export type ParsedDescription =
  | { kind: "graph"; graph: Graph }
  | { kind: "advisory"; advisory: GridAdvisory };
