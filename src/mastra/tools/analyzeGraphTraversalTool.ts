import { createTool } from "@mastra/core/tools";

import { analyze } from "@/graph/analyze";
import { GraphAnalysisInputSchema, GraphAnalysisOutputSchema } from "@/schemas/graphAnalysis";

export const analyzeGraphTraversalTool = createTool({
  id: "analyze-graph-traversal",
  description:
    "Analyze a graph given as an adjacency mapping, an edge list or a grid description. Supports path_analysis (shortest and all simple paths between startNode and endNode), eulerian_path, connectivity and cycle_detection.",
  inputSchema: GraphAnalysisInputSchema,
  outputSchema: GraphAnalysisOutputSchema,
  execute: async ({ context }) => {
    const { graphDescription, analysisType, startNode, endNode, maxPaths } = context;

    return {
      report: analyze(graphDescription, analysisType, startNode, endNode, { maxPaths }),
    };
  },
});
