import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface GraphAnalyzerConfig {
  logLevel: LogLevelName;
  maxPaths: number;
  cycleDisplayLimit: number;
  echoLength: number;
}

export const DEFAULT_CONFIG: GraphAnalyzerConfig = {
  logLevel: "info",
  maxPaths: 10,
  cycleDisplayLimit: 5,
  echoLength: 200,
};

function fallBackTo<T>(name: string, fallback: T) {
  return ({ input }: { input: unknown }): T => {
    console.warn(`Invalid ${name}=${String(input)}, using ${String(fallback)}`);
    return fallback;
  };
}

const positiveInt = (name: string, fallback: number) =>
  z.coerce.number().int().positive().default(fallback).catch(fallBackTo(name, fallback));

const EnvSchema = z.object({
  GRAPH_ANALYZER_LOG_LEVEL: z
    .enum(LOG_LEVELS)
    .default(DEFAULT_CONFIG.logLevel)
    .catch(fallBackTo("GRAPH_ANALYZER_LOG_LEVEL", DEFAULT_CONFIG.logLevel)),
  GRAPH_ANALYZER_MAX_PATHS: positiveInt("GRAPH_ANALYZER_MAX_PATHS", DEFAULT_CONFIG.maxPaths),
  GRAPH_ANALYZER_CYCLE_DISPLAY_LIMIT: positiveInt(
    "GRAPH_ANALYZER_CYCLE_DISPLAY_LIMIT",
    DEFAULT_CONFIG.cycleDisplayLimit,
  ),
  GRAPH_ANALYZER_ECHO_LENGTH: positiveInt("GRAPH_ANALYZER_ECHO_LENGTH", DEFAULT_CONFIG.echoLength),
});

/** Reads settings from the environment; a malformed value is replaced by its default. */
export function loadConfig(env: Record<string, string | undefined> = process.env): GraphAnalyzerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    logLevel: parsed.GRAPH_ANALYZER_LOG_LEVEL,
    maxPaths: parsed.GRAPH_ANALYZER_MAX_PATHS,
    cycleDisplayLimit: parsed.GRAPH_ANALYZER_CYCLE_DISPLAY_LIMIT,
    echoLength: parsed.GRAPH_ANALYZER_ECHO_LENGTH,
  };
}

export const config = loadConfig();
