// lib/demography.ts
//
// Piecewise-linear population size through time. `values[k]` is the size at
// the start of segment k; `breakpoints[k]` is where segment k ends, so there
// is one more value than breakpoints. The first segment starts at 0 and the
// last one (after the final breakpoint) is constant.
import { ArgumentError } from "./errors";

function checkDemography(values: readonly number[], breakpoints: readonly number[], at: number, what: string) {
  if (!Array.isArray(values) || !Array.isArray(breakpoints)) {
    throw new ArgumentError("values and breakpoints must be arrays");
  }
  if (values.length !== breakpoints.length + 1) {
    throw new ArgumentError(
      `expected ${breakpoints.length + 1} values for ${breakpoints.length} breakpoints, got ${values.length}`,
    );
  }
  if (!values.every(Number.isFinite) || !breakpoints.every(Number.isFinite)) {
    throw new ArgumentError("values and breakpoints must be finite numbers");
  }
  if (!Number.isFinite(at)) throw new ArgumentError(`${what} must be a finite number`);
}

/** Population size at time `t`, interpolated (or extrapolated before 0). */
export function demographicPopulation(
  values: readonly number[],
  breakpoints: readonly number[],
  t: number,
): number {
  checkDemography(values, breakpoints, t, "t");

  let k = 0;
  while (k < breakpoints.length && breakpoints[k] < t) k++;
  if (k === breakpoints.length) return values[k];

  const x0 = k > 0 ? breakpoints[k - 1] : 0;
  const width = breakpoints[k] - x0;
  return values[k] + ((t - x0) / width) * (values[k + 1] - values[k]);
}

/**
 * Integral of 1/N(x) over [0, upper]. Linear segments integrate to
 * dx/(N1-N0) * ln(N1/N0), constant ones to dx/N0.
 */
export function demographicIntegral(
  values: readonly number[],
  breakpoints: readonly number[],
  upper: number,
): number {
  checkDemography(values, breakpoints, upper, "upper");

  let x = 0;
  let v = 0;
  for (let k = 0; x < upper; k++) {
    const pop0 = values[k];
    if (k === breakpoints.length) {
      v += (upper - x) / pop0;
      break;
    }

    const x1 = breakpoints[k];
    let pop1 = values[k + 1];
    let dx = x1 - x;
    if (upper < x1) {
      // truncate the segment at `upper`
      const ndx = upper - x;
      pop1 = pop0 + (ndx / dx) * (pop1 - pop0);
      dx = ndx;
    }

    v += pop0 === pop1 ? dx / pop0 : (dx / (pop1 - pop0)) * Math.log(pop1 / pop0);
    x = x1;
  }
  return v;
}
