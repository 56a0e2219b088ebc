/**
 * Scenario Comparison
 *
 * Aggregates two completed runs into the figures the calculator reports:
 * per-year rate difference, diesel displaced, household savings and the
 * emissions proxies. Pure aggregation over records; no engine state.
 *
 * Usage:
 *   const runs = runAllScenarios(params);
 *   const c = compareScenarios(runs['status-quo'], runs['expansion-with-anchor'], {
 *     householdKWh: params.householdKWh,
 *     households: params.households,
 *     fromYear: params.expansionYear,
 *   });
 */

import { ScenarioRun, ScenarioRuns, runAllScenarios } from './engine.js';
import { ParameterBundle } from './params.js';
import { YearRange } from './framework/types.js';
import { MismatchError, ValidationError } from './framework/errors.js';
import { sumBy } from './primitives/math.js';
import { CO2_TONNES_PER_MWH, DEFAULT_YEAR_RANGE, MWH_PER_BARREL } from './constants.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CompareOptions {
  /** Average household consumption (kWh/yr) */
  householdKWh: number;
  /** Residential accounts, for the community-wide total */
  households: number;
  /** First year of the aggregation window (default: first record) */
  fromYear?: number;
  /** Last year of the aggregation window (default: last record) */
  toYear?: number;
}

export interface RateDelta {
  year: number;
  /** baseline − comparison ($/kWh); positive means the comparison is cheaper */
  delta: number;
}

export interface ComparisonResult {
  /** Every year of the runs, not just the window */
  rateDeltas: readonly RateDelta[];

  // Aggregation window (inclusive)
  fromYear: number;
  toYear: number;

  dieselAvoidedMWh: number;
  dieselCostSaved: number;
  /** Cumulative bill savings per household ($) */
  householdSavings: number;
  /** householdSavings × households ($) */
  communitySavings: number;
  co2Tonnes: number;
  barrelsAvoided: number;
}

// =============================================================================
// COMPARISON
// =============================================================================

/**
 * Compare a baseline run against an alternative over the same years.
 *
 * Throws MismatchError if the runs do not cover identical years in the same
 * order, and ValidationError if the window falls outside them.
 */
export function compareScenarios(
  baseline: ScenarioRun,
  comparison: ScenarioRun,
  options: CompareOptions
): ComparisonResult {
  if (baseline.length !== comparison.length) {
    throw new MismatchError(
      `Cannot compare runs of different lengths (${baseline.length} vs ${comparison.length} years)`,
      { baselineLength: baseline.length, comparisonLength: comparison.length }
    );
  }
  if (baseline.length === 0) {
    throw new ValidationError('compare', ['cannot compare empty runs']);
  }

  const rateDeltas: RateDelta[] = [];
  for (let i = 0; i < baseline.length; i++) {
    const b = baseline[i];
    const c = comparison[i];
    if (b.year !== c.year) {
      throw new MismatchError(
        `Runs disagree on year at position ${i} (${b.year} vs ${c.year})`,
        { index: i, baselineYear: b.year, comparisonYear: c.year }
      );
    }
    rateDeltas.push({ year: b.year, delta: b.retailRate - c.retailRate });
  }

  const firstYear = baseline[0].year;
  const lastYear = baseline[baseline.length - 1].year;
  const fromYear = options.fromYear ?? firstYear;
  const toYear = options.toYear ?? lastYear;

  const errors: string[] = [];
  if (!Number.isInteger(fromYear) || !Number.isInteger(toYear)) {
    errors.push(`window must be whole years, got [${fromYear}, ${toYear}]`);
  }
  if (fromYear > toYear) {
    errors.push(`window start ${fromYear} is after end ${toYear}`);
  }
  if (fromYear < firstYear || toYear > lastYear) {
    errors.push(`window [${fromYear}, ${toYear}] is outside the runs' years [${firstYear}, ${lastYear}]`);
  }
  if (errors.length > 0) {
    throw new ValidationError('compare', errors);
  }

  const inWindow = (year: number) => year >= fromYear && year <= toYear;
  const baseWindow = baseline.filter(r => inWindow(r.year));
  const compWindow = comparison.filter(r => inWindow(r.year));

  const dieselAvoidedMWh = sumBy(baseWindow, r => r.dieselMWh) - sumBy(compWindow, r => r.dieselMWh);
  const dieselCostSaved = sumBy(baseWindow, r => r.dieselCost) - sumBy(compWindow, r => r.dieselCost);
  const householdSavings = sumBy(
    rateDeltas.filter(d => inWindow(d.year)),
    d => d.delta * options.householdKWh
  );

  return {
    rateDeltas,
    fromYear,
    toYear,
    dieselAvoidedMWh,
    dieselCostSaved,
    householdSavings,
    communitySavings: householdSavings * options.households,
    co2Tonnes: dieselAvoidedMWh * CO2_TONNES_PER_MWH,
    barrelsAvoided: dieselAvoidedMWh / MWH_PER_BARREL,
  };
}

// =============================================================================
// ALL SCENARIOS
// =============================================================================

export interface CompareAllOptions {
  yearRange?: YearRange;
  /** Window start (default: expansion year, clipped to the range) */
  fromYear?: number;
  /** Window end (default: end of the range) */
  toYear?: number;
}

export interface AllComparisons {
  runs: ScenarioRuns;
  expansionOnly: ComparisonResult;
  expansionWithAnchor: ComparisonResult;
}

/**
 * Run every scenario and compare both expansion futures against the status
 * quo. The default window starts at the expansion year: before it, all three
 * scenarios are identical.
 */
export function compareAll(params: ParameterBundle, options: CompareAllOptions = {}): AllComparisons {
  const yearRange = options.yearRange ?? DEFAULT_YEAR_RANGE;
  const runs = runAllScenarios(params, yearRange);

  const [startYear, endYear] = yearRange;
  const defaultFrom = Math.min(Math.max(params.expansionYear, startYear), endYear);

  const compareOptions: CompareOptions = {
    householdKWh: params.householdKWh,
    households: params.households,
    fromYear: options.fromYear ?? defaultFrom,
    toYear: options.toYear ?? endYear,
  };

  return {
    runs,
    expansionOnly: compareScenarios(runs['status-quo'], runs['expansion-only'], compareOptions),
    expansionWithAnchor: compareScenarios(runs['status-quo'], runs['expansion-with-anchor'], compareOptions),
  };
}
