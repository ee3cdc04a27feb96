import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readInt, readOptionalString } from "./env.js";

/**
 * How parallel edges between the same pair are collapsed while seeding the
 * matrix: `min` keeps the lightest edge, `last` keeps the one listed last.
 */
export type DuplicateEdgePolicy = "min" | "last";

export const DUPLICATE_EDGE_POLICIES: readonly DuplicateEdgePolicy[] = ["min", "last"];

/** Default upper bound on the node count accepted by the engine. */
export const DEFAULT_MAX_NODES = 2048;

export interface ApspConfig {
  readonly maxNodes: number;
  readonly duplicateEdges: DuplicateEdgePolicy;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

/**
 * Reads the runtime configuration from the environment:
 *
 * - `APSP_MAX_NODES`: refuse graphs larger than this (default 2048)
 * - `APSP_DUPLICATE_EDGES`: `min` or `last` (default `min`)
 * - `APSP_LOG_LEVEL`: `debug`, `info`, `warn` or `error` (default `info`)
 * - `APSP_LOG_FILE`: optional file mirroring the log stream
 */
export function loadApspConfig(): ApspConfig {
  return {
    maxNodes: readInt("APSP_MAX_NODES", DEFAULT_MAX_NODES, { min: 1 }),
    duplicateEdges: readEnum("APSP_DUPLICATE_EDGES", DUPLICATE_EDGE_POLICIES, "min"),
    logLevel: readEnum("APSP_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("APSP_LOG_FILE") ?? null,
  };
}
