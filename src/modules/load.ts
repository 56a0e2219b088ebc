/**
 * Load Module
 *
 * Annual energy demand on the utility: existing community customers plus an
 * optional anchor customer.
 *
 * Community load follows two-phase compound growth from the base year:
 * a fast heat-pump adoption phase (r1) through `phase1End`, then a
 * steady-state phase (r2) that starts from the phase-1 terminal value, so
 * the curve has no jump at the boundary. Each year is computed from the base
 * year directly; the prior year's load is kept only to report growth.
 *
 * The anchor (e.g. a data center) arrives with the expansion and draws a flat
 * `anchorMW × anchorCF × 8760` MWh every year after that. It does not grow.
 *
 * Inputs (from other modules):
 * - scenario: which future is being simulated
 * - expansionOnline: expansion year reached (from supply)
 *
 * Outputs (to other modules):
 * - communityLoadMWh: existing-customer load (MWh)
 * - anchorLoadMWh: anchor customer load (MWh)
 * - totalDemandMWh: community + anchor (MWh)
 * - loadGrowthRate: community growth vs. the prior simulated year
 */

import { defineModule, Module } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';
import { twoPhaseCompound } from '../primitives/math.js';
import { Scenario, hasAnchor } from '../domain-types.js';
import { BASE_YEAR, HOURS_PER_YEAR } from '../constants.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface LoadParams {
  /** Community load in the base year (MWh/yr) */
  baseLoadMWh: number;

  /** Phase-1 (adoption) growth rate, fraction/yr */
  adoptionGrowthRate: number;

  /** Last year of phase 1 */
  phase1End: number;

  /** Phase-2 (steady-state) growth rate, fraction/yr */
  steadyGrowthRate: number;

  /** Anchor nameplate load (MW) */
  anchorMW: number;

  /** Anchor capacity factor (fraction of nameplate drawn on average) */
  anchorCF: number;
}

export const loadDefaults: LoadParams = {
  baseLoadMWh: 40_708,        // EIA-861 2023 Short Form, retail sales
  adoptionGrowthRate: 0.05,
  phase1End: 2027,
  steadyGrowthRate: 0.02,
  anchorMW: 2.0,
  anchorCF: 0.90,
};

// =============================================================================
// STATE
// =============================================================================

export interface LoadState {
  /** Community load of the previous simulated year (0 before the first) */
  prevCommunityLoadMWh: number;
}

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface LoadInputs {
  scenario: Scenario;
  expansionOnline: boolean;
}

export interface LoadOutputs {
  communityLoadMWh: number;
  anchorLoadMWh: number;
  totalDemandMWh: number;
  loadGrowthRate: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Community load in `year` (MWh), measured from the base year.
 */
export function communityLoad(params: LoadParams, year: number): number {
  return twoPhaseCompound(
    params.baseLoadMWh,
    BASE_YEAR,
    params.phase1End,
    params.adoptionGrowthRate,
    params.steadyGrowthRate,
    year
  );
}

/**
 * Anchor energy per year once online (MWh)
 */
export function anchorLoadMWh(params: Pick<LoadParams, 'anchorMW' | 'anchorCF'>): number {
  return params.anchorMW * params.anchorCF * HOURS_PER_YEAR;
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const loadModule: Module<
  LoadParams,
  LoadState,
  LoadInputs,
  LoadOutputs
> = defineModule({
  name: 'load',
  description: 'Two-phase community load growth plus flat anchor load',

  defaults: loadDefaults,

  inputs: ['scenario', 'expansionOnline'] as const,

  outputs: [
    'communityLoadMWh',
    'anchorLoadMWh',
    'totalDemandMWh',
    'loadGrowthRate',
  ] as const,

  paramMeta: {
    baseLoadMWh: {
      description: 'Base-year (2023) community load.',
      unit: 'MWh/yr',
      range: { min: 20_000, max: 80_000, default: 40_708 },
      tier: 1,
      source: 'EIA-861 2023 Short Form',
    },
    adoptionGrowthRate: {
      description: 'Annual load growth during heat-pump adoption (phase 1).',
      unit: 'fraction/yr',
      range: { min: 0.01, max: 0.10, default: 0.05 },
      tier: 1,
    },
    phase1End: {
      description: 'Last year of the fast-adoption phase.',
      unit: 'year',
      range: { min: BASE_YEAR, max: 2035, default: 2027 },
      tier: 2,
      integer: true,
    },
    steadyGrowthRate: {
      description: 'Annual load growth after phase 1.',
      unit: 'fraction/yr',
      range: { min: 0.005, max: 0.05, default: 0.02 },
      tier: 1,
    },
    anchorMW: {
      description: 'Anchor customer nameplate load.',
      unit: 'MW',
      range: { min: 0.5, max: 5.0, default: 2.0 },
      tier: 1,
    },
    anchorCF: {
      description: 'Anchor capacity factor.',
      unit: 'fraction',
      range: { min: 0.70, max: 0.99, default: 0.90 },
      tier: 1,
      source: 'Data center industry typical 0.85-0.95',
    },
  },

  validate(params: LoadParams): ValidationResult {
    const result = checkRanges(params, this.paramMeta);

    if (params.phase1End < BASE_YEAR) {
      result.errors.push(`phase1End (${params.phase1End}) cannot precede base year ${BASE_YEAR}`);
    }
    if (params.steadyGrowthRate > params.adoptionGrowthRate) {
      result.warnings.push(
        `steadyGrowthRate ${params.steadyGrowthRate} exceeds adoptionGrowthRate ${params.adoptionGrowthRate}`
      );
    }

    return { ...result, valid: result.errors.length === 0 };
  },

  init(_params: LoadParams): LoadState {
    return { prevCommunityLoadMWh: 0 };
  },

  step(state, inputs, params, year, _yearIndex) {
    const communityLoadMWh = communityLoad(params, year);

    // Branch point: anchor only in its scenario, only once expansion is online
    const anchorActive = hasAnchor(inputs.scenario) && inputs.expansionOnline;
    const anchorMWh = anchorActive ? anchorLoadMWh(params) : 0;

    const loadGrowthRate = state.prevCommunityLoadMWh > 0
      ? communityLoadMWh / state.prevCommunityLoadMWh - 1
      : 0;

    return {
      state: { prevCommunityLoadMWh: communityLoadMWh },
      outputs: {
        communityLoadMWh,
        anchorLoadMWh: anchorMWh,
        totalDemandMWh: communityLoadMWh + anchorMWh,
        loadGrowthRate,
      },
    };
  },
});
