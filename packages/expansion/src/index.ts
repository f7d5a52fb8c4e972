export {
  PolynomialBasis,
  PolynomialBasis as default,
} from "./basis.js";
export type { PolynomialBasisParameters } from "./basis.js";
export { expand, expandRows, evaluate } from "./expand.js";
export { TermMatrix } from "./termMatrix.js";
export type { TermRows } from "./termMatrix.js";
export { ShapeMismatchError, InvalidExponentError } from "./errors.js";
