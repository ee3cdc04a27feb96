import { loadApspConfig, type DuplicateEdgePolicy } from "../config/apsp.js";
import { DirectedGraphError, GraphTooLargeError } from "../errors.js";
import { assertEdgeWeight } from "../graph/model.js";
import { hasNodeLabels, type GraphEdge, type GraphView, type LabelledGraphView } from "../graph/view.js";
import type { Logger } from "../logger.js";
import { DistanceMatrix, UNREACHABLE, saturatingAdd } from "../matrix/distanceMatrix.js";
import { PathMatrix, type ReadonlyPathMatrix } from "../matrix/pathMatrix.js";
import { assertNodeIndex, triangularIndex } from "../matrix/triangular.js";

export interface FloydWarshallOptions {
  /** Collapsing rule for parallel edges. Defaults to `APSP_DUPLICATE_EDGES` (`min`). */
  readonly duplicateEdges?: DuplicateEdgePolicy;
  /** Graphs with more nodes are rejected before any work. Defaults to `APSP_MAX_NODES`. */
  readonly maxNodes?: number;
  readonly logger?: Logger;
}

type Variant = "distances" | "paths";

interface PreparedGraph {
  readonly nodeCount: number;
  /** Node identifiers in enumeration order, validated against `nodeCount`. */
  readonly ids: readonly number[];
  /** One edge per unordered pair after applying the duplicate-edge policy. */
  readonly edges: readonly GraphEdge[];
}

/**
 * Validates the view and reads its nodes and edges once. Self-loops are
 * dropped since no weight can beat the zero diagonal.
 */
function prepareGraph(view: GraphView, variant: Variant, options: FloydWarshallOptions): PreparedGraph {
  if (view.isDirected()) {
    throw new DirectedGraphError();
  }

  const config = loadApspConfig();
  const maxNodes = options.maxNodes ?? config.maxNodes;
  const policy = options.duplicateEdges ?? config.duplicateEdges;
  const logger = options.logger;

  const nodeCount = view.nodeCount();
  if (nodeCount > maxNodes) {
    throw new GraphTooLargeError(nodeCount, maxNodes);
  }

  const ids: number[] = [];
  for (const id of view.nodeIds()) {
    assertNodeIndex(id, nodeCount);
    ids.push(id);
  }

  const collapsed = new Map<number, GraphEdge>();
  let edgeCount = 0;
  for (const edge of view.edges()) {
    assertNodeIndex(edge.source, nodeCount);
    assertNodeIndex(edge.target, nodeCount);
    assertEdgeWeight(edge.weight, edge.source, edge.target);
    edgeCount += 1;
    if (edge.source === edge.target) {
      continue;
    }

    const slot = triangularIndex(edge.source, edge.target);
    const previous = collapsed.get(slot);
    if (previous === undefined) {
      collapsed.set(slot, edge);
      continue;
    }
    const kept = policy === "last" || edge.weight < previous.weight ? edge : previous;
    collapsed.set(slot, kept);
    logger?.debug("apsp_duplicate_edge", {
      source: edge.source,
      target: edge.target,
      policy,
      kept_weight: kept.weight,
      dropped_weight: kept === edge ? previous.weight : edge.weight,
    });
  }

  logger?.debug("apsp_started", { variant, nodes: nodeCount, edges: edgeCount });
  return { nodeCount, ids, edges: [...collapsed.values()] };
}

function logCompletion(
  logger: Logger | undefined,
  variant: Variant,
  nodeCount: number,
  relaxations: number,
  startedAt: number,
): void {
  logger?.debug("apsp_completed", {
    variant,
    nodes: nodeCount,
    relaxations,
    duration_ms: Math.max(0, Date.now() - startedAt),
  });
}

/**
 * Computes the length of the shortest path between every pair of nodes in
 * **O(V³)**. Unreachable pairs keep {@link UNREACHABLE}.
 */
export function floydWarshall(view: GraphView, options: FloydWarshallOptions = {}): DistanceMatrix {
  const startedAt = Date.now();
  const { nodeCount, ids, edges } = prepareGraph(view, "distances", options);
  const matrix = new DistanceMatrix(nodeCount);

  for (const id of ids) {
    matrix.set(id, id, 0);
  }
  for (const edge of edges) {
    matrix.set(edge.source, edge.target, edge.weight);
  }

  let relaxations = 0;
  for (const k of ids) {
    for (const n1 of ids) {
      const toK = matrix.get(n1, k);
      if (toK === UNREACHABLE) {
        continue;
      }
      for (const n2 of ids) {
        if (n1 === n2) {
          continue;
        }
        const candidate = saturatingAdd(toK, matrix.get(k, n2));
        if (candidate < matrix.get(n1, n2)) {
          matrix.set(n1, n2, candidate);
          relaxations += 1;
        }
      }
    }
  }

  logCompletion(options.logger, "distances", nodeCount, relaxations, startedAt);
  return matrix;
}

/**
 * Floyd-Warshall pass that also records, for every pair, the intermediate
 * nodes of one shortest path. Labels come from the view when it provides them
 * and are the node indices otherwise.
 */
export function floydWarshallPaths<L>(
  view: LabelledGraphView<L>,
  options?: FloydWarshallOptions,
): ReadonlyPathMatrix<L>;
export function floydWarshallPaths(view: GraphView, options?: FloydWarshallOptions): ReadonlyPathMatrix<number>;
export function floydWarshallPaths(
  view: GraphView | LabelledGraphView<unknown>,
  options: FloydWarshallOptions = {},
): ReadonlyPathMatrix<unknown> {
  const startedAt = Date.now();
  const { nodeCount, ids, edges } = prepareGraph(view, "paths", options);
  const labelled = hasNodeLabels(view) ? view : null;
  const labelOf = (id: number): unknown => (labelled ? labelled.nodeLabel(id) : id);
  const matrix = new PathMatrix<unknown>(nodeCount);

  for (const id of ids) {
    matrix.replacePath(id, id, 0, []);
  }
  for (const edge of edges) {
    matrix.replacePath(edge.source, edge.target, edge.weight, []);
  }

  let relaxations = 0;
  for (const k of ids) {
    const label = labelOf(k);
    for (const n1 of ids) {
      if (n1 === k) {
        continue;
      }
      const left = matrix.getPath(n1, k);
      if (!left.exists) {
        continue;
      }
      for (const n2 of ids) {
        // Each unordered pair once, and k is never one of its own endpoints.
        if (n1 >= n2 || n2 === k) {
          continue;
        }
        const right = matrix.getPath(k, n2);
        if (!right.exists) {
          continue;
        }
        const candidate = saturatingAdd(left.length, right.length);
        if (candidate === UNREACHABLE) {
          continue;
        }
        const current = matrix.getPath(n1, n2);
        if (current.exists && candidate >= current.length) {
          continue;
        }

        // Stored paths walk from the smaller to the larger index; flip a
        // segment whenever the walk n1 -> k -> n2 runs against that order.
        const head = n1 < k ? left.labels : left.reversed();
        const tail = k < n2 ? right.labels : right.reversed();
        matrix.replacePath(n1, n2, candidate, [...head, label, ...tail]);
        relaxations += 1;
      }
    }
  }

  logCompletion(options.logger, "paths", nodeCount, relaxations, startedAt);
  return matrix.asReadonly();
}
