import { describe, it } from "mocha";
import { expect } from "chai";

import { MissingPathError } from "../../src/errors.js";
import { Path } from "../../src/matrix/path.js";
import { PathMatrix } from "../../src/matrix/pathMatrix.js";

describe("Path", () => {
  it("starts as a missing path", () => {
    const path = new Path<string>();

    expect(path.exists).to.equal(false);
    expect(path.labels).to.deep.equal([]);
    expect(() => path.length).to.throw(MissingPathError, "no path exists between the requested nodes");
    expect(String(path)).to.equal("-");
  });

  it("is replaced wholesale and keeps its own copy of the labels", () => {
    const path = new Path<string>();
    const labels = ["a", "b"];

    path.assign(4, labels);
    labels.push("c");

    expect(path.exists).to.equal(true);
    expect(path.length).to.equal(4);
    expect(path.labels).to.deep.equal(["a", "b"]);
    expect(path.reversed()).to.deep.equal(["b", "a"]);
    expect([...path]).to.deep.equal(["a", "b"]);
    expect(String(path)).to.equal("4:[a, b]");
  });
});

describe("PathMatrix", () => {
  it("shares a path between both orientations of a pair", () => {
    const matrix = new PathMatrix<string>(3);

    expect(matrix.doesPathExist(0, 2)).to.equal(false);
    expect(() => matrix.getPathLength(2, 0)).to.throw(MissingPathError);

    matrix.replacePath(2, 0, 5, ["x", "y"]);

    expect(matrix.doesPathExist(0, 2)).to.equal(true);
    expect(matrix.getPathLength(0, 2)).to.equal(5);
    expect(matrix.getPath(2, 0).labels).to.deep.equal(["x", "y"]);
  });

  it("hands out restartable iterables in storage order", () => {
    const matrix = new PathMatrix<string>(3);
    matrix.replacePath(0, 2, 5, ["x", "y"]);

    const iterable = matrix.getPathIter(2, 0);

    expect([...iterable]).to.deep.equal(["x", "y"]);
    expect([...iterable]).to.deep.equal(["x", "y"]);
    expect([...iterable].reverse()).to.deep.equal(["y", "x"]);
  });

  it("dumps every slot with its length and labels", () => {
    const matrix = new PathMatrix<string>(3);
    matrix.replacePath(0, 2, 5, ["x"]);

    expect(matrix.format()).to.equal("[-]\n[-, -]\n[5:[x], -, -]");
  });
});
