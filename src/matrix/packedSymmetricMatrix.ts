import { assertNodeIndex, buildRowOffsets, triangularSlotCount } from "./triangular.js";

/** Factory invoked once per slot so slots never share mutable objects. */
export type SlotFactory<T> = (slot: number) => T;

/** Renders a single cell in {@link PackedSymmetricMatrix.format}. */
export type CellRenderer<T> = (value: T) => string;

/**
 * Symmetric `n × n` matrix addressed by unordered node pairs. Only the
 * `n·(n+1)/2` slots with `i ≤ j` are stored, in one flat buffer indexed by the
 * triangular offset of the larger index plus the smaller one.
 */
export class PackedSymmetricMatrix<T> {
  readonly size: number;
  readonly slotCount: number;
  protected readonly slots: T[];
  private readonly rowOffsets: Uint32Array;

  constructor(size: number, createSlot: SlotFactory<T>) {
    this.slotCount = triangularSlotCount(size);
    this.size = size;
    this.rowOffsets = buildRowOffsets(size);
    this.slots = Array.from({ length: this.slotCount }, (_, slot) => createSlot(slot));
  }

  /** Packed slot of the pair; throws `NodeIndexError` when out of range. */
  indexOf(i: number, j: number): number {
    assertNodeIndex(i, this.size);
    assertNodeIndex(j, this.size);
    return i <= j ? this.offsetOf(j) + i : this.offsetOf(i) + j;
  }

  get(i: number, j: number): T {
    return this.readSlot(this.indexOf(i, j));
  }

  set(i: number, j: number, value: T): void {
    this.slots[this.indexOf(i, j)] = value;
  }

  /** Yields every packed row `j` as the values of `(0, j) … (j, j)`. */
  *rows(): IterableIterator<readonly T[]> {
    for (let row = 0; row < this.size; row += 1) {
      const offset = this.offsetOf(row);
      yield this.slots.slice(offset, offset + row + 1);
    }
  }

  /** Diagnostic dump of the lower triangle, one row per line. Not a stable format. */
  format(renderCell: CellRenderer<T> = String): string {
    const lines: string[] = [];
    for (const row of this.rows()) {
      lines.push(`[${row.map(renderCell).join(", ")}]`);
    }
    return lines.join("\n");
  }

  toString(): string {
    return this.format();
  }

  protected readSlot(slot: number): T {
    return this.slots[slot];
  }

  private offsetOf(row: number): number {
    return this.rowOffsets[row];
  }
}
