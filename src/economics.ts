/**
 * Anchor & Community Economics
 *
 * Figures derived from the parameters (and, for bills and rate outlook, from
 * completed runs) that sit beside the yearly simulation:
 *
 * - Anchor coverage: how much of the utility's annual debt service the
 *   anchor's above-cost margin pays for
 * - Cumulative coverage from the expansion year on
 * - Household bills and the rate outlook against today's rate
 * - Local economic impact of the anchor build-out
 */

import { ParameterBundle } from './params.js';
import { ScenarioRun, ScenarioRuns, validateYearRange } from './engine.js';
import { anchorLoadMWh } from './modules/load.js';
import { annualDebtService, anchorTariffPerMWh } from './modules/financing.js';
import { Scenario, SCENARIOS } from './domain-types.js';
import { YearRange } from './framework/types.js';
import { ValidationError } from './framework/errors.js';
import {
  BASE_RETAIL_RATE,
  CONSTRUCTION_JOBS_PER_MW,
  CONSTRUCTION_SALARY,
  DEFAULT_YEAR_RANGE,
  OPERATING_SALARY,
} from './constants.js';

// =============================================================================
// ANCHOR COVERAGE
// =============================================================================

/** Coverage ratio thresholds for the viability tiers */
export const FULL_COVERAGE = 0.90;
export const SUBSTANTIAL_COVERAGE = 0.50;

export type Viability = 'full' | 'substantial' | 'partial';

export interface AnchorEconomics {
  anchorLoadMWh: number;
  /** Anchor tariff converted to $/MWh */
  tariffPerMWh: number;
  /** Tariff minus wholesale hydro cost ($/MWh); negative below cost */
  marginPerMWh: number;
  /** Annual tariff revenue ($) */
  annualRevenue: number;
  /** Annual margin above hydro cost ($) */
  annualMargin: number;
  /** Utility's annual expansion debt service ($) */
  debtService: number;
  /** annualMargin / debtService; 0 when there is no debt */
  coverageRatio: number;
  /** Debt service the margin leaves to ratepayers ($) */
  uncoveredDebt: number;
  viability: Viability;
  /** Margin exceeds debt service */
  surplus: boolean;
  tariffBelowCost: boolean;
}

export function classifyCoverage(coverageRatio: number): Viability {
  if (coverageRatio >= FULL_COVERAGE) return 'full';
  if (coverageRatio >= SUBSTANTIAL_COVERAGE) return 'substantial';
  return 'partial';
}

/**
 * Anchor margin vs. expansion debt service.
 *
 * Coverage is not clamped: a ratio above 1 is a surplus that flows back to
 * community rates.
 */
export function anchorEconomics(params: ParameterBundle): AnchorEconomics {
  const load = anchorLoadMWh(params);
  const tariffPerMWh = anchorTariffPerMWh(params);
  const marginPerMWh = tariffPerMWh - params.seapaRate;
  const annualMargin = load * marginPerMWh;
  const debtService = annualDebtService(params);
  const coverageRatio = debtService > 0 ? annualMargin / debtService : 0;

  return {
    anchorLoadMWh: load,
    tariffPerMWh,
    marginPerMWh,
    annualRevenue: load * tariffPerMWh,
    annualMargin,
    debtService,
    coverageRatio,
    uncoveredDebt: Math.max(0, debtService - annualMargin),
    viability: classifyCoverage(coverageRatio),
    surplus: coverageRatio > 1,
    tariffBelowCost: tariffPerMWh < params.seapaRate,
  };
}

export interface CoveragePoint {
  year: number;
  cumulativeDebt: number;
  cumulativeMargin: number;
}

/**
 * Cumulative debt owed vs. cumulative anchor margin, one point per year from
 * the expansion year through the end of the range.
 */
export function cumulativeCoverage(
  params: ParameterBundle,
  yearRange: YearRange = DEFAULT_YEAR_RANGE
): CoveragePoint[] {
  const check = validateYearRange(yearRange);
  if (!check.valid) {
    throw new ValidationError('economics', check.errors);
  }

  const { annualMargin, debtService } = anchorEconomics(params);
  const startYear = Math.max(params.expansionYear, yearRange[0]);
  const points: CoveragePoint[] = [];

  for (let year = startYear; year <= yearRange[1]; year++) {
    const yearsOnline = year - params.expansionYear + 1;
    points.push({
      year,
      cumulativeDebt: debtService * yearsOnline,
      cumulativeMargin: annualMargin * yearsOnline,
    });
  }

  return points;
}

// =============================================================================
// HOUSEHOLD BILLS
// =============================================================================

export interface HouseholdBill {
  year: number;
  /** Annual bill ($) */
  bill: number;
}

/**
 * Annual household bill for each requested year (default: every record).
 * Throws ValidationError for a year the run does not cover.
 */
export function householdBills(
  records: ScenarioRun,
  householdKWh: number,
  years?: readonly number[]
): HouseholdBill[] {
  const selected = years ?? records.map(r => r.year);
  const missing: string[] = [];
  const bills: HouseholdBill[] = [];

  for (const year of selected) {
    const record = records.find(r => r.year === year);
    if (!record) {
      missing.push(`no record for year ${year}`);
      continue;
    }
    bills.push({ year, bill: record.retailRate * householdKWh });
  }

  if (missing.length > 0) {
    throw new ValidationError('economics', missing);
  }
  return bills;
}

// =============================================================================
// RATE OUTLOOK
// =============================================================================

export interface RateOutlookEntry {
  /** Retail rate in the outlook year ($/kWh) */
  rate: number;
  /** rate − baseRate ($/kWh) */
  change: number;
  /** change / baseRate */
  changePct: number;
}

/**
 * Each scenario's rate in `year` against today's observed rate
 */
export function rateOutlook(
  runs: ScenarioRuns,
  year: number,
  baseRate: number = BASE_RETAIL_RATE
): Record<Scenario, RateOutlookEntry> {
  const entry = (scenario: Scenario): RateOutlookEntry => {
    const record = runs[scenario].find(r => r.year === year);
    if (!record) {
      throw new ValidationError('economics', [`${scenario} run has no record for year ${year}`]);
    }
    const change = record.retailRate - baseRate;
    return { rate: record.retailRate, change, changePct: change / baseRate };
  };

  return {
    'status-quo': entry('status-quo'),
    'expansion-only': entry('expansion-only'),
    'expansion-with-anchor': entry('expansion-with-anchor'),
  };
}

/** Scenario with the lowest rate in `year` (first listed wins a tie) */
export function cheapestScenario(runs: ScenarioRuns, year: number): Scenario {
  const outlook = rateOutlook(runs, year);
  let best: Scenario = SCENARIOS[0];
  for (const scenario of SCENARIOS) {
    if (outlook[scenario].rate < outlook[best].rate) {
      best = scenario;
    }
  }
  return best;
}

// =============================================================================
// LOCAL ECONOMIC IMPACT
// =============================================================================

export interface EconomicImpact {
  anchorMW: number;
  constructionJobs: number;
  operatingJobs: number;
  /** $/yr */
  operatingPayroll: number;
  /** One-time construction payroll ($) */
  constructionPayroll: number;
  /** (operating + construction payroll) × local multiplier ($) */
  localEconomicActivity: number;
  /** $/yr */
  annualTariffRevenue: number;
  /** $/yr */
  anchorMargin: number;
}

/**
 * Jobs and payroll from the anchor build-out. Display figures only; nothing
 * here feeds the rate calculation.
 */
export function economicImpact(params: ParameterBundle): EconomicImpact {
  const constructionJobs = params.anchorMW * CONSTRUCTION_JOBS_PER_MW;
  const operatingJobs = params.anchorMW * params.jobsPerMW;
  const operatingPayroll = operatingJobs * OPERATING_SALARY;
  const constructionPayroll = constructionJobs * CONSTRUCTION_SALARY;
  const anchor = anchorEconomics(params);

  return {
    anchorMW: params.anchorMW,
    constructionJobs,
    operatingJobs,
    operatingPayroll,
    constructionPayroll,
    localEconomicActivity: (operatingPayroll + constructionPayroll) * params.localMultiplier,
    annualTariffRevenue: anchor.annualRevenue,
    anchorMargin: anchor.annualMargin,
  };
}
