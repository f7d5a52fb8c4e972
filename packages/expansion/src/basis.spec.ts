import assert from "assert";
import { PolynomialBasis } from "./basis.js";
import { TermMatrix } from "./termMatrix.js";
import { ShapeMismatchError } from "./errors.js";

describe("PolynomialBasis", () => {
  const terms = [
    [1, 0],
    [0, 1],
    [1, 1],
    [2, 0],
  ];

  it("names variables x1, x2, ... by default", () => {
    const basis = new PolynomialBasis({ terms });
    assert.deepEqual(basis.variableNames, ["x1", "x2"]);
    assert.deepEqual(basis.labels(), [
      "(Intercept)",
      "x1",
      "x2",
      "x1*x2",
      "x1^2",
    ]);
  });

  it("uses the variable names it is given", () => {
    const basis = new PolynomialBasis({
      terms,
      variableNames: ["education", "income"],
    });
    assert.deepEqual(basis.labels(), [
      "(Intercept)",
      "education",
      "income",
      "education*income",
      "education^2",
    ]);
  });

  it("expands, expands rows and evaluates against its terms", () => {
    const basis = new PolynomialBasis({ terms });
    assert.equal(basis.size, 5);
    assert.deepEqual(basis.expand([2, 3]), [1, 2, 3, 6, 4]);
    assert.deepEqual(
      basis.expandRows([
        [2, 3],
        [1, 0],
      ]),
      [
        [1, 2, 3, 6, 4],
        [1, 1, 0, 0, 1],
      ],
    );
    assert.equal(basis.evaluate([1, 1, 1, 1, 1], [2, 3]), 16);
  });

  it("keeps the column count of an empty term list", () => {
    const basis = new PolynomialBasis({ terms: [], variables: 2 });
    assert.equal(basis.size, 1);
    assert.deepEqual(basis.variableNames, ["x1", "x2"]);
    assert.deepEqual(basis.expand([4, 5]), [1]);
    assert.deepEqual(basis.labels(), ["(Intercept)"]);
    assert.throws(() => basis.expand([4]), ShapeMismatchError);
  });

  it("accepts a term matrix as is", () => {
    const matrix = new TermMatrix([[1, 1]]);
    assert.equal(new PolynomialBasis({ terms: matrix }).terms, matrix);
  });

  context("validation", () => {
    it("rejects a variable count that disagrees with the term matrix", () => {
      assert.throws(
        () =>
          new PolynomialBasis({
            terms: new TermMatrix([[1, 1]]),
            variables: 3,
          }),
        ShapeMismatchError,
      );
      assert.throws(
        () => new PolynomialBasis({ terms: [[1, 1]], variables: 3 }),
        ShapeMismatchError,
      );
    });

    it("rejects the wrong number of variable names", () => {
      assert.throws(
        () => new PolynomialBasis({ terms, variableNames: ["a"] }),
        (error: unknown) =>
          error instanceof ShapeMismatchError &&
          error.message ===
            "expected number of variable names (1) to equal 2, but it did not",
      );
    });
  });
});
