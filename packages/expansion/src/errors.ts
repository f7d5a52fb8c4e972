/**
   Thrown when two lengths that must agree do not, most commonly an
   input vector whose length differs from the number of columns in the
   term matrix.
*/
export class ShapeMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(description: string, expected: number, actual: number) {
    super(
      `expected ${description} (${actual}) to equal ${expected}, but it did not`,
    );
    this.name = "ShapeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidExponentError extends Error {
  readonly row: number;
  readonly column: number;
  readonly exponent: number;

  constructor(row: number, column: number, exponent: number) {
    super(
      `exponent at row ${row}, column ${column} must be a non-negative integer, got ${exponent}`,
    );
    this.name = "InvalidExponentError";
    this.row = row;
    this.column = column;
    this.exponent = exponent;
  }
}
