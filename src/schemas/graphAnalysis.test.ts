import { describe, expect, it } from "vitest";

import { GraphAnalysisInputSchema, isAnalysisType } from "./graphAnalysis";

describe("GraphAnalysisInputSchema", () => {
  it("fills in the optional fields", () => {
    expect(GraphAnalysisInputSchema.parse({ graphDescription: "A-B" })).toEqual({
      graphDescription: "A-B",
      analysisType: "path_analysis",
      startNode: "",
      endNode: "",
    });
  });

  it("rejects an unknown analysis type", () => {
    const result = GraphAnalysisInputSchema.safeParse({
      graphDescription: "A-B",
      analysisType: "shortest_route",
    });

    expect(result.success).toBe(false);
  });

  it("rejects a non-positive path cap", () => {
    expect(GraphAnalysisInputSchema.safeParse({ graphDescription: "A-B", maxPaths: 0 }).success).toBe(false);
  });
});

describe("isAnalysisType", () => {
  it("accepts only the supported analyses", () => {
    expect(isAnalysisType("cycle_detection")).toBe(true);
    expect(isAnalysisType("topological_sort")).toBe(false);
  });
});
