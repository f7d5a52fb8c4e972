import assert from "assert";
import { InvalidExponentError, ShapeMismatchError } from "./errors.js";

describe("errors", () => {
  context("ShapeMismatchError", () => {
    it("carries both lengths and describes the mismatch", () => {
      const error = new ShapeMismatchError("input length", 2, 3);

      assert(error instanceof Error);
      assert.equal(error.name, "ShapeMismatchError");
      assert.equal(error.expected, 2);
      assert.equal(error.actual, 3);
      assert.equal(
        error.message,
        "expected input length (3) to equal 2, but it did not",
      );
    });
  });

  context("InvalidExponentError", () => {
    it("names the offending position and value", () => {
      const error = new InvalidExponentError(1, 0, -2);

      assert(error instanceof Error);
      assert.equal(error.name, "InvalidExponentError");
      assert.equal(error.row, 1);
      assert.equal(error.column, 0);
      assert.equal(error.exponent, -2);
      assert.equal(
        error.message,
        "exponent at row 1, column 0 must be a non-negative integer, got -2",
      );
    });
  });
});
