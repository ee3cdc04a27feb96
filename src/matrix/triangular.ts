import { MatrixSizeError, NodeIndexError } from "../errors.js";

/** Largest slot count a JavaScript array can hold. */
const MAX_SLOT_COUNT = 2 ** 32 - 1;

/**
 * Number of slots needed to store the upper triangle (diagonal included) of an
 * `n × n` symmetric matrix, i.e. `n·(n+1)/2`.
 */
export function triangularSlotCount(n: number): number {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new MatrixSizeError(n);
  }
  const slots = (n * (n + 1)) / 2;
  if (!Number.isSafeInteger(slots) || slots > MAX_SLOT_COUNT) {
    throw new MatrixSizeError(n);
  }
  return slots;
}

/**
 * Offset of the first slot of every packed row. Row `j` holds the pairs
 * `(0, j) … (j, j)` so its offset is the triangular number `j·(j+1)/2`.
 */
export function buildRowOffsets(n: number): Uint32Array {
  triangularSlotCount(n);
  const offsets = new Uint32Array(n);
  let offset = 0;
  for (let row = 0; row < n; row += 1) {
    offsets[row] = offset;
    offset += row + 1;
  }
  return offsets;
}

/**
 * Maps an unordered pair onto its packed slot. The pair is canonicalised so the
 * smaller index comes first, hence `triangularIndex(i, j) === triangularIndex(j, i)`.
 */
export function triangularIndex(i: number, j: number): number {
  const low = i <= j ? i : j;
  const high = i <= j ? j : i;
  return (high * (high + 1)) / 2 + low;
}

/** Throws {@link NodeIndexError} unless `index` is an integer in `[0, n)`. */
export function assertNodeIndex(index: number, n: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= n) {
    throw new NodeIndexError(index, n);
  }
}
