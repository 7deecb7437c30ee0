import { z } from "zod";

import { GraphBuilder } from "../graph";
import type { GraphParseStrategy } from "./strategy";

const NodeLabelSchema = z.union([z.string(), z.number()]).transform(String);

const AdjacencyMappingSchema = z.record(z.string(), z.array(NodeLabelSchema));

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

function extractMappingBody(text: string): string | null {
  const open = text.indexOf("{");
  const close = text.lastIndexOf("}");
  if (open < 0 || close < open) return null;
  const body = text.slice(open, close + 1);
  if (countOf(body, "{") !== countOf(body, "}")) return null;
  return body;
}

function parseJsonLoosely(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

/** Object key order puts integer-like keys first; restore the order they were written in. */
function inTextOrder<T>(body: string, mapping: Record<string, T>): [string, T][] {
  const position = (key: string) => body.indexOf(JSON.stringify(key));
  return Object.entries(mapping).sort(([a], [b]) => position(a) - position(b));
}

/**
 * `{"A": ["B", "C"], 'B': ['C']}`: each key points at its listed neighbours, one
 * directed edge per list entry.
 */
export const mappingStrategy: GraphParseStrategy = {
  name: "mapping",
  tryParse(text) {
    const body = extractMappingBody(text)?.replace(/'/g, '"');
    if (!body) return null;

    const result = AdjacencyMappingSchema.safeParse(parseJsonLoosely(body));
    if (!result.success) return null;

    const builder = new GraphBuilder();
    for (const [node, neighbours] of inTextOrder(body, result.data)) {
      builder.addNode(node);
      for (const neighbour of neighbours) {
        builder.addEdge(node, neighbour);
      }
    }

    if (builder.edgeCount === 0) return null;
    return { kind: "graph", graph: builder.build() };
  },
};
