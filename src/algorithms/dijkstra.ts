import { DirectedGraphError } from "../errors.js";
import { UndirectedGraph, assertEdgeWeight } from "../graph/model.js";
import type { GraphView } from "../graph/view.js";
import { UNREACHABLE } from "../matrix/distanceMatrix.js";
import { assertNodeIndex } from "../matrix/triangular.js";

interface Neighbour {
  readonly node: number;
  readonly weight: number;
}

type NeighbourLookup = (id: number) => readonly Neighbour[];

/**
 * Adjacency of the view. An {@link UndirectedGraph} already validated its
 * edges and keeps its own lists; any other view is indexed from `edges()`.
 */
function neighbourLookup(view: GraphView, nodeCount: number): NeighbourLookup {
  if (view instanceof UndirectedGraph) {
    const graph = view;
    return (id) => graph.neighbours(id);
  }
  const adjacency: Neighbour[][] = Array.from({ length: nodeCount }, () => []);
  for (const edge of view.edges()) {
    assertNodeIndex(edge.source, nodeCount);
    assertNodeIndex(edge.target, nodeCount);
    assertEdgeWeight(edge.weight, edge.source, edge.target);
    adjacency[edge.source].push({ node: edge.target, weight: edge.weight });
    adjacency[edge.target].push({ node: edge.source, weight: edge.weight });
  }
  return (id) => adjacency[id];
}

/** Closest unsettled node with a finite distance, or -1 when none is left. */
function closestUnsettled(distances: readonly number[], settled: readonly boolean[]): number {
  let best = -1;
  for (let node = 0; node < distances.length; node += 1) {
    if (settled[node] || distances[node] === UNREACHABLE) {
      continue;
    }
    if (best === -1 || distances[node] < distances[best]) {
      best = node;
    }
  }
  return best;
}

/**
 * Shortest distances from `source` to every node, indexed by node id, with
 * {@link UNREACHABLE} for nodes outside its component. Plain Dijkstra with a
 * linear scan for the next node, O(V² + E); meant as a reference row, not as
 * a replacement for the all-pairs engine.
 */
export function singleSourceDistances(view: GraphView, source: number): number[] {
  if (view.isDirected()) {
    throw new DirectedGraphError();
  }
  const nodeCount = view.nodeCount();
  assertNodeIndex(source, nodeCount);
  const neighboursOf = neighbourLookup(view, nodeCount);

  const distances = new Array<number>(nodeCount).fill(UNREACHABLE);
  const settled = new Array<boolean>(nodeCount).fill(false);
  distances[source] = 0;

  for (let current = source; current !== -1; current = closestUnsettled(distances, settled)) {
    settled[current] = true;
    for (const { node, weight } of neighboursOf(current)) {
      const tentative = distances[current] + weight;
      if (tentative < distances[node]) {
        distances[node] = tentative;
      }
    }
  }

  return distances;
}
