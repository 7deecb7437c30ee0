import { GraphBuilder } from "../graph";
import type { GraphParseStrategy } from "./strategy";

const LABEL = "[A-Za-z0-9]+";

// Arrow and dash edges win; bare comma pairs are only read when none exist.
const EDGE_PATTERNS = [
  new RegExp(`(${LABEL})\\s*(->|→|-)\\s*(${LABEL})`, "g"),
  new RegExp(`(${LABEL})\\s*(,)\\s*(${LABEL})`, "g"),
];

const DIRECTED_SEPARATORS = new Set(["->", "→"]);

/** `A-B, B-C` (undirected), `A -> B` or `A → B` (directed), `A, B` (undirected). */
export const edgeListStrategy: GraphParseStrategy = {
  name: "edge-list",
  tryParse(text) {
    const forceUndirected = text.toLowerCase().includes("undirected");

    for (const pattern of EDGE_PATTERNS) {
      const builder = new GraphBuilder();
      for (const [, source, separator, target] of text.matchAll(pattern)) {
        const undirected = forceUndirected || !DIRECTED_SEPARATORS.has(separator);
        builder.addEdge(source, target, undirected);
      }
      if (builder.edgeCount > 0) {
        return { kind: "graph", graph: builder.build() };
      }
    }

    return null;
  },
};
