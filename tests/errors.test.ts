import { describe, it } from "mocha";
import { expect } from "chai";

import {
  ApspError,
  ERROR_CODES,
  GraphTooLargeError,
  MissingPathError,
  NodeIndexError,
  normaliseApspError,
  normaliseErrorMessage,
} from "../src/errors.js";

describe("error normalisation", () => {
  it("exposes code, hint and details of package errors", () => {
    expect(normaliseApspError(new NodeIndexError(5, 3))).to.deep.equal({
      code: "E-APSP-NODE-RANGE",
      message: "node index 5 is outside [0, 3)",
      hint: "node identifiers must be dense integers starting at 0",
      details: { index: 5, nodeCount: 3 },
    });
  });

  it("omits hint and details when an error has none", () => {
    const normalised = normaliseApspError(new ApspError(ERROR_CODES.NO_PATH, "gone"));

    expect(normalised).to.deep.equal({ code: "E-APSP-NO-PATH", message: "gone" });
    expect(Object.hasOwn(normalised, "hint")).to.equal(false);
  });

  it("keeps subclasses distinguishable", () => {
    const error = new GraphTooLargeError(10, 4);

    expect(error).to.be.instanceOf(ApspError);
    expect(error.name).to.equal("GraphTooLargeError");
    expect(error.code).to.equal(ERROR_CODES.TOO_LARGE);
    expect(new MissingPathError().code).to.equal("E-APSP-NO-PATH");
  });

  it("maps JSON syntax errors and foreign errors", () => {
    expect(normaliseApspError(new SyntaxError("Unexpected token"))).to.deep.equal({
      code: "E-APSP-INVALID-INPUT",
      message: "Unexpected token",
      hint: "invalid_json",
    });
    expect(normaliseApspError(new Error("boom"))).to.deep.equal({ code: "E-APSP-UNEXPECTED", message: "boom" });
    expect(normaliseApspError("plain")).to.deep.equal({ code: "E-APSP-UNEXPECTED", message: "plain" });
  });

  it("collapses whitespace and truncates long messages", () => {
    expect(normaliseErrorMessage("  a \n  b ")).to.equal("a b");
    expect(normaliseErrorMessage("   ")).to.equal("unexpected error");

    const long = normaliseErrorMessage("x".repeat(200));
    expect(long).to.have.length(160);
    expect(long.endsWith("…")).to.equal(true);
  });
});
