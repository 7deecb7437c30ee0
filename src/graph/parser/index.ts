import { GraphParseError } from "../errors";
import type { ParsedDescription } from "../types";
import { edgeListStrategy } from "./edgeListStrategy";
import { gridStrategy } from "./gridStrategy";
import { mappingStrategy } from "./mappingStrategy";
import type { GraphParseStrategy } from "./strategy";

export type { GraphParseStrategy } from "./strategy";
export { edgeListStrategy, gridStrategy, mappingStrategy };

export const DEFAULT_STRATEGIES: readonly GraphParseStrategy[] = [
  mappingStrategy,
  edgeListStrategy,
  gridStrategy,
];

export const DEFAULT_ECHO_LENGTH = 200;

export interface ParseOptions {
  strategies?: readonly GraphParseStrategy[];
  echoLength?: number;
}

export interface ParseOutcome {
  strategy: string;
  parsed: ParsedDescription;
}

/** Tries each strategy in order; the first one that recognises the text wins. */
export function parseGraphDescription(
  text: string,
  { strategies = DEFAULT_STRATEGIES, echoLength = DEFAULT_ECHO_LENGTH }: ParseOptions = {},
): ParseOutcome {
  for (const strategy of strategies) {
    const parsed = strategy.tryParse(text);
    if (parsed) {
      return { strategy: strategy.name, parsed };
    }
  }
  throw new GraphParseError(text.slice(0, echoLength));
}
