import { config } from "@/config";
import { logger } from "@/mastra/logger";
import { isAnalysisType, type AnalysisType } from "@/schemas/graphAnalysis";

import { allPaths, connectivity, detectCycles, eulerian, shortestPath } from "./analyzers";
import { GraphParseError, InvalidNodeError } from "./errors";
import { parseGraphDescription } from "./parser";
import { formatGridAdvisory, formatReport } from "./report";
import type { AnalysisResult, Graph, NodeLabel } from "./types";

export interface AnalyzeOptions {
  maxPaths?: number;
  cycleDisplayLimit?: number;
  echoLength?: number;
}

/**
 * Runs one analyzer against a parsed graph. Returns `undefined` for an analysis type
 * it does not know, which the report renders as unknown.
 */
export function runAnalysis(
  graph: Graph,
  analysisType: string,
  startNode: NodeLabel = "",
  endNode: NodeLabel = "",
  maxPaths: number = config.maxPaths,
): AnalysisResult | undefined {
  if (!isAnalysisType(analysisType)) return undefined;

  switch (analysisType) {
    case "connectivity":
      return { type: analysisType, connectivity: connectivity(graph) };
    case "eulerian_path":
      return { type: analysisType, eulerian: eulerian(graph) };
    case "cycle_detection":
      return { type: analysisType, cycles: detectCycles(graph) };
    case "path_analysis":
      if (!startNode) throw new InvalidNodeError("start", startNode, graph.nodes);
      if (!endNode) throw new InvalidNodeError("end", endNode, graph.nodes);
      return {
        type: analysisType,
        paths: {
          start: startNode,
          end: endNode,
          shortestPath: shortestPath(graph, startNode, endNode),
          allPaths: allPaths(graph, startNode, endNode, maxPaths),
          maxPaths,
        },
      };
  }
}

/**
 * Parses a free-form graph description, runs the requested analysis and returns a
 * text report. Never throws: failures come back as a short error description.
 */
export function analyze(
  graphDescription: string,
  analysisType: AnalysisType = "path_analysis",
  startNode: NodeLabel = "",
  endNode: NodeLabel = "",
  options: AnalyzeOptions = {},
): string {
  const {
    maxPaths = config.maxPaths,
    cycleDisplayLimit = config.cycleDisplayLimit,
    echoLength = config.echoLength,
  } = options;

  logger.info("Graph traversal analysis called", { analysisType });

  try {
    const { strategy, parsed } = parseGraphDescription(graphDescription, { echoLength });
    logger.debug("Graph description parsed", { strategy, kind: parsed.kind });

    if (parsed.kind === "advisory") {
      return formatGridAdvisory(analysisType, parsed.advisory);
    }

    const result = runAnalysis(parsed.graph, analysisType, startNode, endNode, maxPaths);
    const report = formatReport(analysisType, parsed.graph, result, { cycleDisplayLimit });
    logger.info("Graph analysis completed", { analysisType, nodes: parsed.graph.nodes.length });
    return report;
  } catch (error) {
    if (error instanceof GraphParseError) {
      logger.warn("Graph description not recognised", { echo: error.inputEcho });
      return error.message;
    }
    if (error instanceof InvalidNodeError) {
      logger.warn("Invalid node for graph analysis", { role: error.role, label: error.label });
      return `Error in graph analysis: ${error.message}`;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Graph traversal analysis failed", { error: message });
    return `Error in graph analysis: ${message}`;
  }
}
