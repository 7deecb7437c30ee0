export { analyze, runAnalysis, type AnalyzeOptions } from "./graph/analyze";
export { allPaths, connectivity, detectCycles, eulerian, shortestPath } from "./graph/analyzers";
export { GraphParseError, InvalidNodeError } from "./graph/errors";
export { GraphBuilder, toEdgeList } from "./graph/graph";
export { DEFAULT_STRATEGIES, parseGraphDescription, type GraphParseStrategy } from "./graph/parser";
export { formatGridAdvisory, formatReport } from "./graph/report";
export type * from "./graph/types";
export { analyzeGraphTraversalTool } from "./mastra/tools/analyzeGraphTraversalTool";
export {
  ANALYSIS_TYPES,
  AnalysisTypeSchema,
  GraphAnalysisInputSchema,
  GraphAnalysisOutputSchema,
  type AnalysisType,
  type GraphAnalysisInput,
} from "./schemas/graphAnalysis";
