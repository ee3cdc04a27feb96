/** Weighted edge between two dense node indices. */
export interface GraphEdge {
  readonly source: number;
  readonly target: number;
  readonly weight: number;
}

/**
 * Read-only capabilities the shortest-path engine needs from a graph. Node
 * identifiers are dense integers in `[0, nodeCount())`.
 */
export interface GraphView {
  nodeCount(): number;
  /** Every node identifier, each exactly once. */
  nodeIds(): Iterable<number>;
  edges(): Iterable<GraphEdge>;
  isDirected(): boolean;
}

/**
 * Graph view that also names its nodes. Reconstructed paths record these
 * labels; plain {@link GraphView}s get raw node indices instead.
 */
export interface LabelledGraphView<L> extends GraphView {
  nodeLabel(id: number): L;
}

/** Narrows a view to {@link LabelledGraphView} when it exposes labels. */
export function hasNodeLabels(view: GraphView | LabelledGraphView<unknown>): view is LabelledGraphView<unknown> {
  return "nodeLabel" in view && typeof view.nodeLabel === "function";
}
