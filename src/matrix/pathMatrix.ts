import { PackedSymmetricMatrix } from "./packedSymmetricMatrix.js";
import { Path, type ReadonlyPath } from "./path.js";

/** Query-only surface of a solved {@link PathMatrix}. */
export interface ReadonlyPathMatrix<L> {
  readonly size: number;
  getPathLength(i: number, j: number): number;
  getPath(i: number, j: number): ReadonlyPath<L>;
  getPathIter(i: number, j: number): Iterable<L>;
  doesPathExist(i: number, j: number): boolean;
  format(): string;
}

/**
 * Packed matrix of {@link Path} records. The path stored for the canonical
 * pair `(a, b)` with `a < b` walks from `a` to `b`; callers walking `b → a`
 * reverse it.
 */
export class PathMatrix<L> extends PackedSymmetricMatrix<Path<L>> {
  constructor(size: number) {
    super(size, () => new Path<L>());
  }

  /** Length of the shortest path. Throws `MissingPathError` when none exists. */
  getPathLength(i: number, j: number): number {
    return this.get(i, j).length;
  }

  getPath(i: number, j: number): ReadonlyPath<L> {
    return this.get(i, j);
  }

  /**
   * Restartable iterable over the intermediate labels in canonical storage
   * order (smaller index first).
   */
  getPathIter(i: number, j: number): Iterable<L> {
    const path = this.get(i, j);
    return {
      [Symbol.iterator]: () => path.labels[Symbol.iterator](),
    };
  }

  doesPathExist(i: number, j: number): boolean {
    return this.get(i, j).exists;
  }

  /**
   * Frozen facade forwarding the query methods only. The engine keeps the
   * matrix itself, so slots cannot be rewritten through the returned value.
   */
  asReadonly(): ReadonlyPathMatrix<L> {
    const view: ReadonlyPathMatrix<L> = {
      size: this.size,
      getPathLength: (i, j) => this.getPathLength(i, j),
      getPath: (i, j) => this.getPath(i, j),
      getPathIter: (i, j) => this.getPathIter(i, j),
      doesPathExist: (i, j) => this.doesPathExist(i, j),
      format: () => this.format(),
    };
    return Object.freeze(view);
  }

  /** @internal Records a path of the given length and labels for the pair. */
  replacePath(i: number, j: number, length: number, labels: readonly L[]): void {
    this.get(i, j).assign(length, labels);
  }
}
