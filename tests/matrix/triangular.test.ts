import { describe, it } from "mocha";
import { expect } from "chai";

import { MatrixSizeError, NodeIndexError } from "../../src/errors.js";
import { PackedSymmetricMatrix } from "../../src/matrix/packedSymmetricMatrix.js";
import {
  assertNodeIndex,
  buildRowOffsets,
  triangularIndex,
  triangularSlotCount,
} from "../../src/matrix/triangular.js";

describe("triangular packing", () => {
  it("counts n(n+1)/2 slots", () => {
    expect(triangularSlotCount(0)).to.equal(0);
    expect(triangularSlotCount(1)).to.equal(1);
    expect(triangularSlotCount(4)).to.equal(10);
    expect(triangularSlotCount(100)).to.equal(5050);
  });

  it("lays rows out one after another", () => {
    expect(triangularIndex(0, 0)).to.equal(0);
    expect(triangularIndex(0, 1)).to.equal(1);
    expect(triangularIndex(1, 1)).to.equal(2);
    expect(triangularIndex(0, 2)).to.equal(3);
    expect(triangularIndex(2, 1)).to.equal(4);
    expect(triangularIndex(2, 2)).to.equal(5);
    expect(triangularIndex(3, 0)).to.equal(6);
    expect(Array.from(buildRowOffsets(4))).to.deep.equal([0, 1, 3, 6]);
  });

  for (const size of [0, 1, 2, 3, 4, 5, 8, 13, 32]) {
    it(`maps every unordered pair of a ${size}-node matrix onto a unique slot`, () => {
      const matrix = new PackedSymmetricMatrix<number>(size, () => 0);
      const seen = new Set<number>();

      for (let i = 0; i < size; i += 1) {
        for (let j = 0; j < size; j += 1) {
          const slot = matrix.indexOf(i, j);
          expect(slot).to.equal(matrix.indexOf(j, i));
          expect(slot).to.equal(triangularIndex(i, j));
          if (i <= j) {
            expect(seen.has(slot), `slot ${slot} reused by (${i}, ${j})`).to.equal(false);
            seen.add(slot);
          }
        }
      }

      expect(seen.size).to.equal(matrix.slotCount);
      for (let slot = 0; slot < matrix.slotCount; slot += 1) {
        expect(seen.has(slot)).to.equal(true);
      }
    });
  }

  it("rejects sizes that cannot be packed", () => {
    expect(() => triangularSlotCount(-1)).to.throw(MatrixSizeError);
    expect(() => triangularSlotCount(2.5)).to.throw(MatrixSizeError);
    expect(() => triangularSlotCount(Number.NaN)).to.throw(MatrixSizeError);
    expect(() => triangularSlotCount(2 ** 20)).to.throw(MatrixSizeError);
  });

  it("fails fast on indices outside the node range", () => {
    expect(() => assertNodeIndex(3, 4)).to.not.throw();
    expect(() => assertNodeIndex(4, 4)).to.throw(NodeIndexError, "node index 4 is outside [0, 4)");
    expect(() => assertNodeIndex(-1, 4)).to.throw(NodeIndexError);
    expect(() => assertNodeIndex(1.5, 4)).to.throw(NodeIndexError);

    try {
      assertNodeIndex(7, 2);
      expect.fail("expected a NodeIndexError");
    } catch (error) {
      expect(error).to.be.instanceOf(NodeIndexError);
      if (error instanceof NodeIndexError) {
        expect(error.code).to.equal("E-APSP-NODE-RANGE");
        expect(error.details).to.deep.equal({ index: 7, nodeCount: 2 });
      }
    }
  });
});
