import { arr } from "@polyexp/common";
import { InvalidExponentError, ShapeMismatchError } from "./errors.js";

export type TermRows = readonly (readonly number[])[];

// CLASS DEFINITION
// ================================================================================================
/**
   An exponent matrix with one row per monomial and one column per
   variable. Entry `[i][j]` is the power of variable `j` in monomial `i`.
   Instances are validated on construction and never change afterwards.
*/
export class TermMatrix {
  readonly #rows: number[][];
  readonly variables: number;

  // CONSTRUCTOR
  // --------------------------------------------------------------------------------------------
  /**
     @param variables the column count; required to give a matrix with
     no rows any columns at all, otherwise taken from the first row
  */
  constructor(
    rows: TermRows,
    variables = rows.length > 0 ? rows[0].length : 0,
  ) {
    this.variables = variables;
    this.#rows = rows.map((row, i) => {
      if (row.length !== variables) {
        throw new ShapeMismatchError(
          `length of term row ${i}`,
          variables,
          row.length,
        );
      }
      row.forEach((exponent, j) => {
        if (!Number.isSafeInteger(exponent) || exponent < 0) {
          throw new InvalidExponentError(i, j, exponent);
        }
      });
      return [...row];
    });
  }

  static from(terms: TermMatrix | TermRows): TermMatrix {
    return terms instanceof TermMatrix ? terms : new TermMatrix(terms);
  }

  // PROPERTIES
  // --------------------------------------------------------------------------------------------
  get terms(): number {
    return this.#rows.length;
  }

  /** @internal the rows themselves; callers must not mutate them */
  get exponents(): TermRows {
    return this.#rows;
  }

  // ACCESSORS
  // --------------------------------------------------------------------------------------------
  private exponentsOf(index: number): readonly number[] {
    const row = this.#rows[index];
    if (row === undefined) {
      throw new RangeError(
        `term index ${index} is outside of 0..${this.terms - 1}`,
      );
    }
    return row;
  }

  row(index: number): number[] {
    return [...this.exponentsOf(index)];
  }

  /** total degree of the monomial at `index` */
  degree(index: number): number {
    return this.exponentsOf(index).reduce(
      (sum, exponent) => sum + exponent,
      0,
    );
  }

  toRows(): number[][] {
    return arr(this.terms, (i) => this.row(i));
  }

  /**
     Renders the monomial at `index` as a product of named powers, such
     as `a^2*b`. A row of zeros renders as `1`.
  */
  label(index: number, names: readonly string[]): string {
    if (names.length !== this.variables) {
      throw new ShapeMismatchError(
        "number of variable names",
        this.variables,
        names.length,
      );
    }

    const factors = this.exponentsOf(index).flatMap((exponent, j) => {
      if (exponent === 0) return [];
      return [exponent === 1 ? names[j] : `${names[j]}^${exponent}`];
    });

    return factors.length > 0 ? factors.join("*") : "1";
  }
}
