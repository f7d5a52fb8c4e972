import Benchmark from "benchmark";
import { arr } from "@polyexp/common";
import { PolynomialBasis, TermMatrix } from "@polyexp/expansion";

const suite = new Benchmark.Suite("Polynomial expansion");

// every monomial of total degree 1..maxDegree over `variables` variables
function allTerms(variables: number, maxDegree: number): number[][] {
  let rows: number[][] = [[]];
  for (let j = 0; j < variables; j++) {
    rows = rows.flatMap((row) => {
      const used = row.reduce((sum, power) => sum + power, 0);
      return arr(maxDegree - used + 1, (power) => [...row, power]);
    });
  }
  return rows.filter((row) => row.some((power) => power > 0));
}

function buildBasis(variables: number, maxDegree: number): PolynomialBasis {
  return new PolynomialBasis({
    terms: new TermMatrix(allTerms(variables, maxDegree), variables),
  });
}

function randomInput(variables: number): number[] {
  return arr(variables, () => Math.random() * 2 - 1);
}

const cubic = buildBasis(3, 3);
const quintic = buildBasis(6, 5);
const observations = arr(100, () => randomInput(3));

suite.add(`3 variables, degree 3 (${cubic.size} terms)`, () => {
  cubic.expand(randomInput(3));
});

suite.add(`6 variables, degree 5 (${quintic.size} terms)`, () => {
  quintic.expand(randomInput(6));
});

suite.add("100 observations, 3 variables, degree 3", () => {
  cubic.expandRows(observations);
});

suite.on("cycle", (event: Benchmark.Event) => {
  console.log(String(event.target));
  console.log(event.target.stats);
});

suite.run();
