import { describe, expect, it } from "vitest";

import { GraphParseError } from "../errors";
import { randomGraph, seededRandom } from "../testUtils";
import { toEdgeList } from "../graph";
import type { Graph, ParsedDescription } from "../types";
import { edgeListStrategy } from "./edgeListStrategy";
import { gridStrategy } from "./gridStrategy";
import { parseGraphDescription } from "./index";
import { mappingStrategy } from "./mappingStrategy";

function graphOf(parsed: ParsedDescription | null): Graph {
  if (parsed?.kind !== "graph") {
    throw new Error(`expected a graph, got ${parsed?.kind ?? "null"}`);
  }
  return parsed.graph;
}

function adjacencyOf(graph: Graph): Record<string, readonly string[]> {
  return Object.fromEntries(graph.adjacency);
}

describe("mappingStrategy", () => {
  it("reads keys and listed neighbours as directed edges", () => {
    const graph = graphOf(mappingStrategy.tryParse('{"A": ["B", "C"], "B": ["C"]}'));

    expect(graph.nodes).toEqual(["A", "B", "C"]);
    expect(adjacencyOf(graph)).toEqual({ A: ["B", "C"], B: ["C"], C: [] });
  });

  it("accepts single-quoted keys and values", () => {
    const graph = graphOf(mappingStrategy.tryParse("{'X': ['Y'], 'Y': []}"));

    expect(adjacencyOf(graph)).toEqual({ X: ["Y"], Y: [] });
  });

  it("turns numeric neighbours into labels", () => {
    const graph = graphOf(mappingStrategy.tryParse('{"1": [2, 3]}'));

    expect(graph.nodes).toEqual(["1", "2", "3"]);
  });

  it("keeps integer-like keys in the order they are written", () => {
    const graph = graphOf(mappingStrategy.tryParse('{"B": ["10"], "10": ["C"]}'));
    expect(graph.nodes).toEqual(["B", "10", "C"]);
    expect(adjacencyOf(graph)).toEqual({ B: ["10"], "10": ["C"], C: [] });

    const numeric = graphOf(mappingStrategy.tryParse("{'3': ['1'], '1': ['2'], '2': []}"));
    expect(numeric.nodes).toEqual(["3", "1", "2"]);
  });

  it("keeps keys with no neighbours as nodes", () => {
    const graph = graphOf(mappingStrategy.tryParse('{"A": ["B"], "C": []}'));

    expect(graph.nodes).toEqual(["A", "B", "C"]);
  });

  it("finds the mapping inside surrounding prose", () => {
    const graph = graphOf(mappingStrategy.tryParse('The network is {"A": ["B"]} as given.'));

    expect(adjacencyOf(graph)).toEqual({ A: ["B"], B: [] });
  });

  it("declines text that is not a mapping of lists", () => {
    expect(mappingStrategy.tryParse("{A-B, B-C}")).toBeNull();
    expect(mappingStrategy.tryParse('{"A": "B"}')).toBeNull();
    expect(mappingStrategy.tryParse('{"A": []}')).toBeNull();
    expect(mappingStrategy.tryParse("A-B")).toBeNull();
  });
});

describe("edgeListStrategy", () => {
  it("symmetrises dash-separated edges", () => {
    const graph = graphOf(edgeListStrategy.tryParse("A-B, B-C, C-D"));

    expect(graph.nodes).toEqual(["A", "B", "C", "D"]);
    expect(adjacencyOf(graph)).toEqual({ A: ["B"], B: ["A", "C"], C: ["B", "D"], D: ["C"] });
  });

  it("keeps arrow edges directed", () => {
    const graph = graphOf(edgeListStrategy.tryParse("A -> B, B → C"));

    expect(adjacencyOf(graph)).toEqual({ A: ["B"], B: ["C"], C: [] });
  });

  it("symmetrises arrows when the text says undirected", () => {
    const graph = graphOf(edgeListStrategy.tryParse("Undirected graph: A -> B"));

    expect(adjacencyOf(graph)).toEqual({ A: ["B"], B: ["A"] });
  });

  it("reads newline-separated edges", () => {
    const graph = graphOf(edgeListStrategy.tryParse("1 -> 2\n2 -> 3"));

    expect(graph.nodes).toEqual(["1", "2", "3"]);
  });

  it("falls back to comma pairs only when no arrow or dash edge exists", () => {
    const pairs = graphOf(edgeListStrategy.tryParse("A, B\nB, C"));
    expect(adjacencyOf(pairs)).toEqual({ A: ["B"], B: ["A", "C"], C: ["B"] });

    const dashed = graphOf(edgeListStrategy.tryParse("A-B, C"));
    expect(dashed.nodes).toEqual(["A", "B"]);
  });

  it("declines text without edges", () => {
    expect(edgeListStrategy.tryParse("hello world")).toBeNull();
  });
});

describe("gridStrategy", () => {
  it("counts colour and ownership references", () => {
    const parsed = gridStrategy.tryParse(
      "Mina rents the green plots. Can Mina walk through every green cell without backtracking? Corners matter.",
    );

    expect(parsed).toEqual({
      kind: "advisory",
      advisory: { referenceCount: 2, asksForTraversal: true, mentionsCornersOrEdges: true },
    });
  });

  it("reports plain grid mentions without a traversal question", () => {
    expect(gridStrategy.tryParse("Each plot is owned by a red or blue team")).toEqual({
      kind: "advisory",
      advisory: { referenceCount: 3, asksForTraversal: false, mentionsCornersOrEdges: false },
    });
  });

  it("ignores words that merely contain the vocabulary", () => {
    expect(gridStrategy.tryParse("an excellent result")).toBeNull();
  });
});

describe("parseGraphDescription", () => {
  it("prefers the mapping form over edge patterns inside it", () => {
    const outcome = parseGraphDescription('{"A-B": ["C"]}');

    expect(outcome.strategy).toBe("mapping");
    expect(graphOf(outcome.parsed).nodes).toEqual(["A-B", "C"]);
  });

  it("falls through to the edge list when the braces do not hold a mapping", () => {
    const outcome = parseGraphDescription("{A-B, B-C}");

    expect(outcome.strategy).toBe("edge-list");
    expect(adjacencyOf(graphOf(outcome.parsed))).toEqual({ A: ["B"], B: ["A", "C"], C: ["B"] });
  });

  it("uses the grid advisory only when no edge was found", () => {
    expect(parseGraphDescription("green plot A-B").strategy).toBe("edge-list");
    expect(parseGraphDescription("a green plot").strategy).toBe("grid");
  });

  it("honours a custom strategy order", () => {
    const outcome = parseGraphDescription("green plot A-B", {
      strategies: [gridStrategy, edgeListStrategy],
    });

    expect(outcome.strategy).toBe("grid");
  });

  it("throws a parse error echoing the input", () => {
    expect(() => parseGraphDescription("hello world no graph here")).toThrow(
      "Could not parse graph structure from: hello world no graph here...",
    );
  });

  it("truncates the echoed input", () => {
    try {
      parseGraphDescription("x".repeat(300), { echoLength: 10 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GraphParseError);
      expect(error instanceof GraphParseError && error.inputEcho).toBe("xxxxxxxxxx");
    }
  });

  it("rebuilds a graph from its own edge-list rendering", () => {
    const random = seededRandom(7);
    for (let round = 0; round < 25; round++) {
      const original = randomGraph(random, {
        nodeCount: 3 + (round % 6),
        edgeCount: 2 + round,
        undirected: round % 2 === 0,
      });
      const connected = original.nodes.filter((node) => {
        const out = original.adjacency.get(node) ?? [];
        const incoming = original.nodes.some((other) => (original.adjacency.get(other) ?? []).includes(node));
        return out.length > 0 || incoming;
      });

      const reparsed = graphOf(parseGraphDescription(toEdgeList(original)).parsed);

      expect([...reparsed.nodes].sort()).toEqual([...connected].sort());
      for (const node of connected) {
        expect(reparsed.adjacency.get(node)).toEqual(original.adjacency.get(node));
      }
    }
  });
});
