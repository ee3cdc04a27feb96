import { floydWarshallPaths, type FloydWarshallOptions } from "./algorithms/floydWarshall.js";
import type { GraphView, LabelledGraphView } from "./graph/view.js";
import { UNREACHABLE } from "./matrix/distanceMatrix.js";
import type { ReadonlyPathMatrix } from "./matrix/pathMatrix.js";

/** Serialisable summary of one reachable pair. */
export interface ShortestPathEntry<L> {
  readonly from: number;
  readonly to: number;
  readonly distance: number;
  readonly path: readonly L[];
}

export interface ShortestPathsJson<L> {
  readonly nodeCount: number;
  readonly pairs: ShortestPathEntry<L>[];
}

/**
 * Read-only answer to the all-pairs shortest path problem. Every query takes
 * the endpoints in traversal order: `path(i, j)` walks from `i` to `j`.
 */
export class ShortestPaths<L> {
  constructor(readonly matrix: ReadonlyPathMatrix<L>) {}

  get nodeCount(): number {
    return this.matrix.size;
  }

  /** Shortest distance, or {@link UNREACHABLE} when no path exists. */
  distance(i: number, j: number): number {
    const path = this.matrix.getPath(i, j);
    return path.exists ? path.length : UNREACHABLE;
  }

  pathExists(i: number, j: number): boolean {
    return this.matrix.doesPathExist(i, j);
  }

  /**
   * Intermediate labels met when walking from `i` to `j`. Empty for adjacent
   * or identical nodes and for pairs without a path.
   */
  path(i: number, j: number): readonly L[] {
    const stored = this.matrix.getPath(i, j);
    return i <= j ? stored.labels : stored.reversed();
  }

  /** Restartable iterable with the same order as {@link path}. */
  pathIter(i: number, j: number): Iterable<L> {
    if (i <= j) {
      return this.matrix.getPathIter(i, j);
    }
    const stored = this.matrix.getPath(i, j);
    return {
      *[Symbol.iterator]() {
        const labels = stored.labels;
        for (let index = labels.length - 1; index >= 0; index -= 1) {
          yield labels[index];
        }
      },
    };
  }

  /** Diagnostic dump of the packed matrix, one row per line. */
  format(): string {
    return this.matrix.format();
  }

  /** Every reachable pair `from < to`, in row-major order. */
  toJSON(): ShortestPathsJson<L> {
    const pairs: ShortestPathEntry<L>[] = [];
    for (let from = 0; from < this.nodeCount; from += 1) {
      for (let to = from + 1; to < this.nodeCount; to += 1) {
        const path = this.matrix.getPath(from, to);
        if (path.exists) {
          pairs.push({ from, to, distance: path.length, path: [...path.labels] });
        }
      }
    }
    return { nodeCount: this.nodeCount, pairs };
  }
}

/**
 * Solves all-pairs shortest paths with path reconstruction and wraps the
 * result in a {@link ShortestPaths} query object.
 */
export function computeShortestPaths<L>(view: LabelledGraphView<L>, options?: FloydWarshallOptions): ShortestPaths<L>;
export function computeShortestPaths(view: GraphView, options?: FloydWarshallOptions): ShortestPaths<number>;
export function computeShortestPaths(
  view: GraphView | LabelledGraphView<unknown>,
  options: FloydWarshallOptions = {},
): ShortestPaths<unknown> {
  return new ShortestPaths(floydWarshallPaths(view, options));
}
