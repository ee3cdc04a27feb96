import { InvalidWeightError } from "../errors.js";
import { assertNodeIndex } from "../matrix/triangular.js";
import type { GraphEdge, LabelledGraphView } from "./view.js";

/** `[source, target, weight]` triple accepted by {@link UndirectedGraph.extendWithEdges}. */
export type EdgeTuple = readonly [number, number, number];

/** Throws {@link InvalidWeightError} unless `weight` is a non-negative safe integer. */
export function assertEdgeWeight(weight: number, source: number, target: number): void {
  if (!Number.isSafeInteger(weight) || weight < 0) {
    throw new InvalidWeightError(weight, source, target);
  }
}

/**
 * In-memory undirected graph with dense node indices. Nodes are numbered in
 * insertion order and carry an arbitrary label.
 */
export class UndirectedGraph<L> implements LabelledGraphView<L> {
  private readonly labels: L[] = [];
  private readonly edgeList: GraphEdge[] = [];
  private readonly adjacency: GraphEdge[][] = [];

  /** Builds a graph whose `count` nodes are labelled by their own index. */
  static withNodes(count: number): UndirectedGraph<number> {
    const graph = new UndirectedGraph<number>();
    for (let id = 0; id < count; id += 1) {
      graph.addNode(id);
    }
    return graph;
  }

  addNode(label: L): number {
    const id = this.labels.length;
    this.labels.push(label);
    this.adjacency.push([]);
    return id;
  }

  addEdge(source: number, target: number, weight: number): GraphEdge {
    assertNodeIndex(source, this.labels.length);
    assertNodeIndex(target, this.labels.length);
    assertEdgeWeight(weight, source, target);
    const edge: GraphEdge = { source, target, weight };
    this.edgeList.push(edge);
    this.adjacency[source]?.push(edge);
    if (source !== target) {
      this.adjacency[target]?.push(edge);
    }
    return edge;
  }

  extendWithEdges(edges: Iterable<EdgeTuple>): void {
    for (const [source, target, weight] of edges) {
      this.addEdge(source, target, weight);
    }
  }

  /** Edges touching `id`, in insertion order. */
  incidentEdges(id: number): readonly GraphEdge[] {
    assertNodeIndex(id, this.labels.length);
    return this.adjacency[id] ?? [];
  }

  /** Opposite endpoint and weight of every edge touching `id`. */
  neighbours(id: number): Array<{ node: number; weight: number }> {
    return this.incidentEdges(id).map((edge) => ({
      node: edge.source === id ? edge.target : edge.source,
      weight: edge.weight,
    }));
  }

  nodeCount(): number {
    return this.labels.length;
  }

  *nodeIds(): IterableIterator<number> {
    for (let id = 0; id < this.labels.length; id += 1) {
      yield id;
    }
  }

  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  edgeCount(): number {
    return this.edgeList.length;
  }

  isDirected(): boolean {
    return false;
  }

  nodeLabel(id: number): L {
    assertNodeIndex(id, this.labels.length);
    return this.labels[id];
  }
}
