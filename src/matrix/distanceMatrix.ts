import { PackedSymmetricMatrix } from "./packedSymmetricMatrix.js";

/** Sentinel stored for pairs without any known finite distance. */
export const UNREACHABLE = Number.POSITIVE_INFINITY;

/**
 * Adds two distances, saturating at {@link UNREACHABLE}. A sum involving the
 * sentinel, or one that leaves the safe-integer range, never turns into a
 * finite value.
 */
export function saturatingAdd(a: number, b: number): number {
  if (a === UNREACHABLE || b === UNREACHABLE) {
    return UNREACHABLE;
  }
  const sum = a + b;
  return Number.isSafeInteger(sum) ? sum : UNREACHABLE;
}

/** Renders a distance cell, using `∞` for the sentinel. */
export function formatDistance(value: number): string {
  return value === UNREACHABLE ? "∞" : String(value);
}

/**
 * Shortest-path lengths between every pair of nodes, as produced by the
 * distance-only Floyd-Warshall pass.
 */
export class DistanceMatrix extends PackedSymmetricMatrix<number> {
  constructor(size: number) {
    super(size, () => UNREACHABLE);
  }

  isReachable(i: number, j: number): boolean {
    return this.get(i, j) !== UNREACHABLE;
  }

  override format(): string {
    return super.format(formatDistance);
  }
}
