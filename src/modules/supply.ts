/**
 * Supply Module
 *
 * Wholesale hydro energy available to the utility each year.
 *
 * The hydro cap is a fixed annual energy ceiling. In scenarios that build
 * the new turbine, the cap steps up once, in the expansion year, and stays
 * elevated for every later year.
 *
 * Inputs (from the runner):
 * - scenario: which future is being simulated
 *
 * Outputs (to other modules):
 * - expansionOnline: true from the expansion year onward (any scenario)
 * - hydroCapMWh: hydro energy ceiling this year (MWh)
 */

import { defineModule, Module } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';
import { Scenario, hasExpansion } from '../domain-types.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface SupplyParams {
  /** Pre-expansion hydro energy cap (MWh/yr) */
  hydroCapMWh: number;

  /** Year the new turbine comes online */
  expansionYear: number;

  /** Hydro energy added by the expansion (MWh/yr) */
  expansionMWh: number;
}

export const supplyDefaults: SupplyParams = {
  hydroCapMWh: 40_200,     // 40,708 MWh sold minus 508 MWh diesel (2023)
  expansionYear: 2027,
  expansionMWh: 37_000,    // 5 MW × 8,760 h × 0.845 CF
};

// =============================================================================
// STATE
// =============================================================================

/** Supply module has no persistent state - pure function of year */
export interface SupplyState {}

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface SupplyInputs {
  scenario: Scenario;
}

export interface SupplyOutputs {
  /** Expansion year reached (independent of whether the scenario builds it) */
  expansionOnline: boolean;

  /** Hydro energy ceiling this year (MWh) */
  hydroCapMWh: number;
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const supplyModule: Module<
  SupplyParams,
  SupplyState,
  SupplyInputs,
  SupplyOutputs
> = defineModule({
  name: 'supply',
  description: 'Hydro energy cap with a one-time expansion step',

  defaults: supplyDefaults,

  inputs: ['scenario'] as const,

  outputs: ['expansionOnline', 'hydroCapMWh'] as const,

  paramMeta: {
    hydroCapMWh: {
      description: 'Current wholesale hydro energy cap.',
      unit: 'MWh/yr',
      range: { min: 20_000, max: 60_000, default: 40_200 },
      tier: 1,
      source: 'EIA-861 2023: total sales minus diesel generation',
    },
    expansionYear: {
      description: 'Year the new turbine (and any anchor load) comes online.',
      unit: 'year',
      range: { min: 2024, max: 2035, default: 2027 },
      tier: 1,
      integer: true,
    },
    expansionMWh: {
      description: 'Hydro energy the expansion adds for this utility.',
      unit: 'MWh/yr',
      range: { min: 10_000, max: 60_000, default: 37_000 },
      tier: 1,
      source: '5 MW × 8,760 h × 0.845 capacity factor',
    },
  },

  validate(params: SupplyParams): ValidationResult {
    return checkRanges(params, this.paramMeta);
  },

  init(_params: SupplyParams): SupplyState {
    return {};
  },

  step(_state, inputs, params, year, _yearIndex) {
    const expansionOnline = year >= params.expansionYear;

    // Branch point: cap steps up once, at the expansion year
    const hydroCapMWh = hasExpansion(inputs.scenario) && expansionOnline
      ? params.hydroCapMWh + params.expansionMWh
      : params.hydroCapMWh;

    return {
      state: {},
      outputs: {
        expansionOnline,
        hydroCapMWh,
      },
    };
  },
});
