/**
 * Primitive mathematical functions
 *
 * Pure functions with no dependencies - the foundation of all calculations.
 */

/**
 * Compound growth: start × (1 + rate)^years
 */
export function compound(start: number, rate: number, years: number): number {
  return start * Math.pow(1 + rate, years);
}

/**
 * Two-phase compound growth anchored at a base year.
 *
 * Grows at `rate1` until `phaseEnd`, then at `rate2` from the value reached at
 * `phaseEnd`, so the curve is continuous at the boundary.
 *
 * @param start - Value at `baseYear`
 * @param baseYear - Year the growth is measured from
 * @param phaseEnd - Last year of phase 1 (inclusive)
 * @param rate1 - Phase-1 annual growth
 * @param rate2 - Phase-2 annual growth
 * @param year - Year to evaluate
 */
export function twoPhaseCompound(
  start: number,
  baseYear: number,
  phaseEnd: number,
  rate1: number,
  rate2: number,
  year: number
): number {
  if (year <= phaseEnd) {
    return compound(start, rate1, year - baseYear);
  }
  const terminal = compound(start, rate1, phaseEnd - baseYear);
  return compound(terminal, rate2, year - phaseEnd);
}

/**
 * Level annual payment on an amortizing loan (annuity / PMT formula)
 *
 * payment = P × r × (1+r)^n / ((1+r)^n − 1), and P / n when the
 * growth term vanishes (r = 0, or r too small to register).
 *
 * @param principal - Amount borrowed
 * @param rate - Annual interest rate (fraction)
 * @param years - Number of annual payments
 */
export function annuityPayment(principal: number, rate: number, years: number): number {
  // (1+r)^n − 1 without cancellation, so tiny rates do not round it to 0
  const excess = rate === 0 ? 0 : Math.expm1(years * Math.log1p(rate));
  if (excess === 0) {
    return principal / years;
  }
  return (principal * rate * (1 + excess)) / excess;
}

/**
 * Sum a numeric projection over a list
 */
export function sumBy<T>(items: readonly T[], fn: (item: T) => number): number {
  let total = 0;
  for (const item of items) {
    total += fn(item);
  }
  return total;
}
