import { z } from "zod";

export const ANALYSIS_TYPES = ["path_analysis", "eulerian_path", "connectivity", "cycle_detection"] as const;

export const AnalysisTypeSchema = z
  .enum(ANALYSIS_TYPES)
  .describe("Which analysis to run over the described graph");

export type AnalysisType = z.infer<typeof AnalysisTypeSchema>;

export function isAnalysisType(value: string): value is AnalysisType {
  return AnalysisTypeSchema.safeParse(value).success;
}

export const GraphAnalysisInputSchema = z.object({
  graphDescription: z
    .string()
    .describe(
      'Graph as an adjacency mapping ({"A": ["B"]}), an edge list ("A-B, B-C" or "A -> B") or a grid/plot description',
    ),
  analysisType: AnalysisTypeSchema.default("path_analysis"),
  startNode: z.string().default("").describe("Start node label, required for path_analysis"),
  endNode: z.string().default("").describe("End node label, required for path_analysis"),
  maxPaths: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Upper bound on the simple paths listed by path_analysis"),
});

export type GraphAnalysisInput = z.infer<typeof GraphAnalysisInputSchema>;

export const GraphAnalysisOutputSchema = z.object({
  report: z.string().describe("Plain-text analysis report, or a short error description"),
});
