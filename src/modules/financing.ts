/**
 * Financing Module
 *
 * Capital and contract cash flows tied to the expansion:
 *
 * 1. DEBT SERVICE - the utility's share of the turbine capex, repaid as a
 *    level annuity. Computed once at init; charged every year from the
 *    expansion year on, in scenarios that build the expansion.
 *
 * 2. ANCHOR REVENUE - anchor load billed at the anchor tariff. The tariff is
 *    quoted per kWh and converted to $/MWh before billing.
 *
 * Inputs (from other modules):
 * - scenario: which future is being simulated
 * - expansionOnline: expansion year reached (from supply)
 * - anchorLoadMWh: anchor energy this year (from load)
 *
 * Outputs (to other modules):
 * - debtService: annual debt payment ($)
 * - anchorRevenue: anchor tariff revenue ($)
 */

import { defineModule, Module } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';
import { annuityPayment } from '../primitives/math.js';
import { Scenario, hasAnchor, hasExpansion } from '../domain-types.js';
import { KWH_PER_MWH } from '../constants.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface FinancingParams {
  /** Total expansion capital cost ($) */
  capex: number;

  /** Fraction of the expansion debt this utility services */
  debtShare: number;

  /** Bond interest rate (fraction/yr) */
  financingRate: number;

  /** Bond term (years) */
  bondTermYears: number;

  /** Anchor tariff ($/kWh) */
  anchorTariffKWh: number;
}

export const financingDefaults: FinancingParams = {
  capex: 20_000_000,          // Third-turbine engineering estimate
  debtShare: 0.40,            // Proportional to share of wholesale load
  financingRate: 0.05,        // Municipal bond assumption
  bondTermYears: 25,
  anchorTariffKWh: 0.12,
};

// =============================================================================
// STATE
// =============================================================================

export interface FinancingState {
  /** Level payment once debt service starts ($/yr) */
  annualDebtService: number;
}

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface FinancingInputs {
  scenario: Scenario;
  expansionOnline: boolean;
  anchorLoadMWh: number;
}

export interface FinancingOutputs {
  debtService: number;
  anchorRevenue: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Level annual payment on the utility's share of the expansion capex.
 */
export function annualDebtService(
  params: Pick<FinancingParams, 'capex' | 'debtShare' | 'financingRate' | 'bondTermYears'>
): number {
  return annuityPayment(params.capex * params.debtShare, params.financingRate, params.bondTermYears);
}

/** Anchor tariff in $/MWh */
export function anchorTariffPerMWh(params: Pick<FinancingParams, 'anchorTariffKWh'>): number {
  return params.anchorTariffKWh * KWH_PER_MWH;
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const financingModule: Module<
  FinancingParams,
  FinancingState,
  FinancingInputs,
  FinancingOutputs
> = defineModule({
  name: 'financing',
  description: 'Expansion debt service and anchor tariff revenue',

  defaults: financingDefaults,

  inputs: ['scenario', 'expansionOnline', 'anchorLoadMWh'] as const,

  outputs: ['debtService', 'anchorRevenue'] as const,

  paramMeta: {
    capex: {
      description: 'Total expansion capital cost.',
      unit: '$',
      range: { min: 10_000_000, max: 50_000_000, default: 20_000_000 },
      tier: 1,
    },
    debtShare: {
      description: "Utility's share of the expansion debt.",
      unit: 'fraction',
      range: { min: 0.20, max: 0.60, default: 0.40 },
      tier: 1,
    },
    financingRate: {
      description: 'Interest rate on expansion bonds.',
      unit: 'fraction/yr',
      range: { min: 0, max: 0.08, default: 0.05 },
      tier: 1,
    },
    bondTermYears: {
      description: 'Bond term.',
      unit: 'years',
      range: { min: 10, max: 40, default: 25 },
      tier: 1,
      integer: true,
    },
    anchorTariffKWh: {
      description: 'Tariff the anchor customer pays.',
      unit: '$/kWh',
      range: { min: 0.07, max: 0.20, default: 0.12 },
      tier: 1,
    },
  },

  validate(params: FinancingParams): ValidationResult {
    const result = checkRanges(params, this.paramMeta);

    if (params.bondTermYears <= 0) {
      result.errors.push(`bondTermYears must be positive, got ${params.bondTermYears}`);
    }
    if (params.financingRate < 0) {
      result.errors.push(`financingRate cannot be negative, got ${params.financingRate}`);
    }

    return { ...result, valid: result.errors.length === 0 };
  },

  init(params: FinancingParams): FinancingState {
    return { annualDebtService: annualDebtService(params) };
  },

  step(state, inputs, params, _year, _yearIndex) {
    const { scenario, expansionOnline, anchorLoadMWh } = inputs;

    // Branch points: debt follows the expansion, revenue follows the anchor
    const debtService = hasExpansion(scenario) && expansionOnline ? state.annualDebtService : 0;
    const anchorRevenue = hasAnchor(scenario) && expansionOnline
      ? anchorLoadMWh * anchorTariffPerMWh(params)
      : 0;

    return {
      state,
      outputs: {
        debtService,
        anchorRevenue,
      },
    };
  },
});
