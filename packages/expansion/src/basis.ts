import { arr } from "@polyexp/common";
import { ShapeMismatchError } from "./errors.js";
import { TermMatrix } from "./termMatrix.js";
import type { TermRows } from "./termMatrix.js";
import { evaluate, expand, expandRows } from "./expand.js";

/**
   Parameters from which to build a {@linkcode PolynomialBasis}
*/
export interface PolynomialBasisParameters {
  /**
     The exponent matrix, one row per monomial. Plain rows are validated
     into a {@linkcode TermMatrix}.
  **/
  terms: TermMatrix | TermRows;
  /**
     The number of variables. Only needed when `terms` is a plain, empty
     array; otherwise it must agree with the column count of `terms`.
  */
  variables?: number;
  /**
     Names used by {@linkcode PolynomialBasis.labels}, one per variable.
     Defaults to `x1`, `x2`, ...
  */
  variableNames?: readonly string[];
}

/**
   A fixed set of monomials over named variables. Each method returns
   values in the same order: the constant term, then one entry per row
   of the term matrix.
*/
export class PolynomialBasis {
  readonly terms: TermMatrix;
  readonly variableNames: readonly string[];

  constructor({
    terms,
    variables,
    variableNames,
  }: PolynomialBasisParameters) {
    if (terms instanceof TermMatrix) {
      if (variables !== undefined && variables !== terms.variables) {
        throw new ShapeMismatchError(
          "number of variables",
          terms.variables,
          variables,
        );
      }
      this.terms = terms;
    } else {
      this.terms = new TermMatrix(terms, variables);
    }

    const names =
      variableNames ?? arr(this.terms.variables, (j) => `x${j + 1}`);
    if (names.length !== this.terms.variables) {
      throw new ShapeMismatchError(
        "number of variable names",
        this.terms.variables,
        names.length,
      );
    }
    this.variableNames = [...names];
  }

  /** the length of every expansion, including the constant term */
  get size(): number {
    return this.terms.terms + 1;
  }

  expand(x: readonly number[]): number[] {
    return expand(x, this.terms);
  }

  expandRows(data: readonly (readonly number[])[]): number[][] {
    return expandRows(data, this.terms);
  }

  evaluate(coefficients: readonly number[], x: readonly number[]): number {
    return evaluate(coefficients, x, this.terms);
  }

  labels(): string[] {
    return [
      "(Intercept)",
      ...arr(this.terms.terms, (i) =>
        this.terms.label(i, this.variableNames),
      ),
    ];
  }
}
