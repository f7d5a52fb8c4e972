import { arr, fill, zip } from "@polyexp/common";
import { ShapeMismatchError } from "./errors.js";
import { TermMatrix } from "./termMatrix.js";
import type { TermRows } from "./termMatrix.js";

function rowsOf(terms: TermMatrix | TermRows): TermRows {
  return terms instanceof TermMatrix ? terms.exponents : terms;
}

function ensureInputLength(
  x: readonly number[],
  terms: TermMatrix | TermRows,
) {
  if (terms instanceof TermMatrix) {
    if (x.length !== terms.variables) {
      throw new ShapeMismatchError(
        "input length",
        terms.variables,
        x.length,
      );
    }
    return;
  }

  for (const row of terms) {
    if (row.length !== x.length) {
      throw new ShapeMismatchError("input length", row.length, x.length);
    }
  }
}

/**
   Computes the raw polynomial expansion of `x`: a leading `1` followed by
   the value of each monomial described by a row of `terms`.

   Plain rows are not validated beyond their lengths. Factors whose
   exponent is not positive are skipped, so `0^0` is never evaluated.

   @throws {@linkcode ShapeMismatchError} when `x` does not have one value
   per column of `terms`
*/
export function expand(
  x: readonly number[],
  terms: TermMatrix | TermRows,
): number[] {
  ensureInputLength(x, terms);

  const rows = rowsOf(terms);

  const ans = fill(rows.length + 1, 1);
  for (let i = 0; i < rows.length; i++) {
    const powers = rows[i];
    for (let j = 0; j < powers.length; j++) {
      if (powers[j] > 0) ans[i + 1] *= x[j] ** powers[j];
    }
  }

  return ans;
}

/**
   Expands every observation in `data` (one row per observation, one
   column per variable), producing a model matrix with one expansion
   per row.
*/
export function expandRows(
  data: readonly (readonly number[])[],
  terms: TermMatrix | TermRows,
): number[][] {
  const matrix = TermMatrix.from(terms);

  data.forEach((observation, index) => {
    if (observation.length !== matrix.variables) {
      throw new ShapeMismatchError(
        `length of observation ${index}`,
        matrix.variables,
        observation.length,
      );
    }
  });

  return arr(data.length, (index) => expand(data[index], matrix));
}

/**
   Evaluates the polynomial `coefficients · expand(x, terms)`. The first
   coefficient multiplies the constant term.
*/
export function evaluate(
  coefficients: readonly number[],
  x: readonly number[],
  terms: TermMatrix | TermRows,
): number {
  const size = rowsOf(terms).length + 1;
  if (coefficients.length !== size) {
    throw new ShapeMismatchError(
      "number of coefficients",
      size,
      coefficients.length,
    );
  }

  return zip(coefficients, expand(x, terms)).reduce(
    (sum, [coefficient, value]) => sum + coefficient * value,
    0,
  );
}
