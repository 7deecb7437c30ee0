import type { GraphParseStrategy } from "./strategy";

const GRID_VOCABULARY = /\b(?:green|plots?|cells?|owned)\b/i;
const OWNERSHIP_REFERENCES = /\b(?:green|red|blue|yellow|white|black|owned)\b/gi;
const TRAVERSAL_QUESTION = /without backtracking|\bcan \w+ walk\b/i;
const CORNER_OR_EDGE = /\b(?:corners?|edges?)\b/i;

/**
 * Plot-ownership puzzles describe coloured cells rather than edges. No geometry is
 * reconstructed; the outcome only counts colour/ownership mentions for the report.
 */
export const gridStrategy: GraphParseStrategy = {
  name: "grid",
  tryParse(text) {
    if (!GRID_VOCABULARY.test(text)) return null;

    return {
      kind: "advisory",
      advisory: {
        referenceCount: text.match(OWNERSHIP_REFERENCES)?.length ?? 0,
        asksForTraversal: TRAVERSAL_QUESTION.test(text),
        mentionsCornersOrEdges: CORNER_OR_EDGE.test(text),
      },
    };
  },
};
