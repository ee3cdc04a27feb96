import { MissingPathError } from "../errors.js";
import { UNREACHABLE } from "./distanceMatrix.js";

/** Read-only view of a recorded shortest path. */
export interface ReadonlyPath<L> extends Iterable<L> {
  /** Whether any path between the two endpoints is known. */
  readonly exists: boolean;
  /** Total weight of the path. Throws `MissingPathError` when {@link exists} is false. */
  readonly length: number;
  /** Intermediate labels, endpoints excluded, in storage order. */
  readonly labels: readonly L[];
  /** Labels walked in the opposite direction. */
  reversed(): L[];
}

/**
 * Sequence of intermediate node labels along the best known route between two
 * endpoints. The endpoints themselves are never part of {@link labels}.
 *
 * Slots start as "no path" and are replaced wholesale by the engine through
 * {@link assign}; nothing else mutates them.
 */
export class Path<L> implements ReadonlyPath<L> {
  private sequence: readonly L[] = [];
  private cachedLength = UNREACHABLE;
  private known = false;

  get exists(): boolean {
    return this.known;
  }

  get length(): number {
    if (!this.known) {
      throw new MissingPathError();
    }
    return this.cachedLength;
  }

  get labels(): readonly L[] {
    return this.sequence;
  }

  [Symbol.iterator](): Iterator<L> {
    return this.sequence[Symbol.iterator]();
  }

  reversed(): L[] {
    return [...this.sequence].reverse();
  }

  /** @internal Replaces the whole path in one step. */
  assign(length: number, labels: readonly L[]): void {
    this.sequence = Object.freeze([...labels]);
    this.cachedLength = length;
    this.known = true;
  }

  toString(): string {
    return this.known ? `${this.cachedLength}:[${this.sequence.join(", ")}]` : "-";
  }
}
