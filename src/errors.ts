import { z } from "zod";

/** Stable error codes surfaced by the package. */
export const ERROR_CODES = {
  DIRECTED: "E-APSP-DIRECTED",
  NODE_RANGE: "E-APSP-NODE-RANGE",
  WEIGHT: "E-APSP-WEIGHT",
  MATRIX_SIZE: "E-APSP-MATRIX-SIZE",
  TOO_LARGE: "E-APSP-TOO-LARGE",
  NO_PATH: "E-APSP-NO-PATH",
  INVALID_INPUT: "E-APSP-INVALID-INPUT",
  UNEXPECTED: "E-APSP-UNEXPECTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Maximum number of UTF-16 code units kept in normalised messages. */
export const ERROR_TEXT_MAX_LENGTH = 160;

/**
 * Base class of every error thrown by the package. Subclasses only pick a code,
 * a hint and structured details so callers can branch on `code` without
 * parsing messages.
 */
export class ApspError extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string | undefined;
  public readonly details: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, hint?: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApspError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Raised when a directed graph is handed to the engine. */
export class DirectedGraphError extends ApspError {
  constructor() {
    super(ERROR_CODES.DIRECTED, "all-pairs shortest paths require an undirected graph", "build the graph as undirected");
    this.name = "DirectedGraphError";
  }
}

/** Raised when a node index falls outside `[0, n)`. */
export class NodeIndexError extends ApspError {
  constructor(
    readonly index: number,
    readonly nodeCount: number,
  ) {
    super(
      ERROR_CODES.NODE_RANGE,
      `node index ${index} is outside [0, ${nodeCount})`,
      "node identifiers must be dense integers starting at 0",
      { index, nodeCount },
    );
    this.name = "NodeIndexError";
  }
}

/** Raised for negative, fractional or non-finite edge weights. */
export class InvalidWeightError extends ApspError {
  constructor(
    readonly weight: number,
    source: number,
    target: number,
  ) {
    super(
      ERROR_CODES.WEIGHT,
      `edge ${source} - ${target} has invalid weight ${String(weight)}`,
      "weights must be non-negative safe integers",
      { weight, source, target },
    );
    this.name = "InvalidWeightError";
  }
}

/** Raised when the packed storage for `n` nodes cannot be allocated. */
export class MatrixSizeError extends ApspError {
  constructor(readonly size: number) {
    super(ERROR_CODES.MATRIX_SIZE, `cannot allocate a packed matrix for ${String(size)} nodes`, undefined, { size });
    this.name = "MatrixSizeError";
  }
}

/** Raised when the node count exceeds the configured `maxNodes` guard. */
export class GraphTooLargeError extends ApspError {
  constructor(
    readonly nodeCount: number,
    readonly maxNodes: number,
  ) {
    super(
      ERROR_CODES.TOO_LARGE,
      `graph has ${nodeCount} nodes, more than the allowed ${maxNodes}`,
      "raise APSP_MAX_NODES or pass a larger maxNodes option",
      { nodeCount, maxNodes },
    );
    this.name = "GraphTooLargeError";
  }
}

/** Raised when the length of a path that does not exist is read. */
export class MissingPathError extends ApspError {
  constructor() {
    super(ERROR_CODES.NO_PATH, "no path exists between the requested nodes", "check exists before reading the length");
    this.name = "MissingPathError";
  }
}

/** Plain representation of a thrown value, suitable for logs and CLI output. */
export interface NormalisedApspError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Collapses whitespace and truncates overly long messages. */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Maps any thrown value onto {@link NormalisedApspError}. Zod validation
 * failures become `E-APSP-INVALID-INPUT` with the issues attached as details.
 */
export function normaliseApspError(error: unknown): NormalisedApspError {
  if (error instanceof z.ZodError) {
    return {
      code: ERROR_CODES.INVALID_INPUT,
      message: normaliseErrorMessage(error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")),
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  if (error instanceof SyntaxError) {
    return { code: ERROR_CODES.INVALID_INPUT, message: normaliseErrorMessage(error.message), hint: "invalid_json" };
  }
  if (error instanceof ApspError) {
    return {
      code: error.code,
      message: normaliseErrorMessage(error.message),
      ...(error.hint === undefined ? {} : { hint: error.hint }),
      ...(error.details === undefined ? {} : { details: error.details }),
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: ERROR_CODES.UNEXPECTED, message: normaliseErrorMessage(message) };
}
