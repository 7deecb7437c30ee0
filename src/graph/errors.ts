import type { NodeLabel } from "./types";

/** No edge or node structure could be extracted from the description. */
export class GraphParseError extends Error {
  readonly name = "GraphParseError";

  constructor(readonly inputEcho: string) {
    super(`Could not parse graph structure from: ${inputEcho}...`);
  }
}

export type EndpointRole = "start" | "end";

export class InvalidNodeError extends Error {
  readonly name = "InvalidNodeError";

  constructor(
    readonly role: EndpointRole,
    readonly label: NodeLabel,
    readonly validNodes: readonly NodeLabel[],
  ) {
    super(
      label === ""
        ? `Path analysis requires ${role === "end" ? "an" : "a"} ${role} node. Valid nodes: ${validNodes.join(", ")}`
        : `${role === "start" ? "Start" : "End"} node '${label}' does not exist in the graph. Valid nodes: ${validNodes.join(", ")}`,
    );
  }
}
