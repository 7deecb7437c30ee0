import type { ParsedDescription } from "../types";

/**
 * One way of reading a free-form graph description. Returns `null` when the text
 * does not look like this strategy's format so the next strategy can try.
 */
export interface GraphParseStrategy {
  readonly name: string;
  tryParse(text: string): ParsedDescription | null;
}
