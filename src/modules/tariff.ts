/**
 * Tariff Module
 *
 * Rolls the year's costs up into the retail rate community customers pay.
 *
 *   dieselRate    = dieselBaseCost × (1 + escalation)^(year − 2023)
 *   totalCost     = fixed + hydro + diesel + debt service
 *   communityCost = totalCost − anchor revenue
 *   retailRate    = max(0.05, communityCost / community kWh)
 *
 * Community cost is NOT clamped: an anchor that over-covers the system shows
 * up as a negative community cost. Only the retail rate has a floor.
 *
 * Inputs (from other modules):
 * - communityLoadMWh (from load)
 * - hydroMWh, dieselMWh (from dispatch)
 * - debtService, anchorRevenue (from financing)
 *
 * Outputs:
 * - dieselRate ($/MWh), hydroCost, dieselCost, totalCost, communityCost ($)
 * - retailRate ($/kWh)
 */

import { defineModule, Module } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';
import { DomainError } from '../framework/errors.js';
import { compound } from '../primitives/math.js';
import { BASE_YEAR, KWH_PER_MWH, RATE_FLOOR } from '../constants.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface TariffParams {
  /** Wholesale hydro rate ($/MWh) */
  seapaRate: number;

  /** Base-year all-in diesel cost ($/MWh) */
  dieselBaseCost: number;

  /** Diesel cost escalation (fraction/yr) */
  dieselEscalation: number;

  /** Utility fixed costs: O&M, staff, distribution, admin ($/yr) */
  fixedCost: number;
}

export const tariffDefaults: TariffParams = {
  seapaRate: 93,              // Back-calculated from 2023 EIA-861 actuals
  dieselBaseCost: 150,        // Fuel + barge delivery + O&M
  dieselEscalation: 0.03,
  fixedCost: 1_200_000,       // Pending audit confirmation
};

// =============================================================================
// STATE
// =============================================================================

/** Tariff module has no persistent state - pure function of inputs */
export interface TariffState {}

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface TariffInputs {
  communityLoadMWh: number;
  hydroMWh: number;
  dieselMWh: number;
  debtService: number;
  anchorRevenue: number;
}

export interface TariffOutputs {
  dieselRate: number;
  hydroCost: number;
  dieselCost: number;
  totalCost: number;
  communityCost: number;
  retailRate: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Diesel unit cost in `year` ($/MWh). Independent of dispatch volume.
 */
export function dieselRate(params: Pick<TariffParams, 'dieselBaseCost' | 'dieselEscalation'>, year: number): number {
  return compound(params.dieselBaseCost, params.dieselEscalation, year - BASE_YEAR);
}

/**
 * Retail rate ($/kWh) for community customers, floored at the regulatory
 * minimum.
 */
export function retailRate(communityCost: number, communityLoadMWh: number, year: number): number {
  if (communityLoadMWh === 0) {
    throw new DomainError('Community load is zero; retail rate is undefined', year);
  }
  if (!Number.isFinite(communityCost)) {
    throw new DomainError(`Community cost is not finite (${communityCost})`, year);
  }
  return Math.max(RATE_FLOOR, communityCost / (communityLoadMWh * KWH_PER_MWH));
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const tariffModule: Module<
  TariffParams,
  TariffState,
  TariffInputs,
  TariffOutputs
> = defineModule({
  name: 'tariff',
  description: 'Cost roll-up and floored community retail rate',

  defaults: tariffDefaults,

  inputs: [
    'communityLoadMWh',
    'hydroMWh',
    'dieselMWh',
    'debtService',
    'anchorRevenue',
  ] as const,

  outputs: [
    'dieselRate',
    'hydroCost',
    'dieselCost',
    'totalCost',
    'communityCost',
    'retailRate',
  ] as const,

  paramMeta: {
    seapaRate: {
      description: 'Wholesale hydro rate.',
      unit: '$/MWh',
      range: { min: 50, max: 150, default: 93 },
      tier: 1,
      source: '(revenue - fixed - diesel cost) / hydro MWh, EIA-861 2023',
    },
    dieselBaseCost: {
      description: 'All-in diesel cost in the base year.',
      unit: '$/MWh',
      range: { min: 80, max: 300, default: 150 },
      tier: 1,
    },
    dieselEscalation: {
      description: 'Annual diesel cost escalation.',
      unit: 'fraction/yr',
      range: { min: 0, max: 0.06, default: 0.03 },
      tier: 1,
    },
    fixedCost: {
      description: 'Utility fixed costs (O&M, staff, distribution, admin).',
      unit: '$/yr',
      range: { min: 500_000, max: 5_000_000, default: 1_200_000 },
      tier: 1,
    },
  },

  validate(params: TariffParams): ValidationResult {
    return checkRanges(params, this.paramMeta);
  },

  init(_params: TariffParams): TariffState {
    return {};
  },

  step(_state, inputs, params, year, _yearIndex) {
    const { communityLoadMWh, hydroMWh, dieselMWh, debtService, anchorRevenue } = inputs;

    const unitDieselRate = dieselRate(params, year);
    const hydroCost = params.seapaRate * hydroMWh;
    const dieselCost = unitDieselRate * dieselMWh;

    const totalCost = params.fixedCost + hydroCost + dieselCost + debtService;
    const communityCost = totalCost - anchorRevenue;

    return {
      state: {},
      outputs: {
        dieselRate: unitDieselRate,
        hydroCost,
        dieselCost,
        totalCost,
        communityCost,
        retailRate: retailRate(communityCost, communityLoadMWh, year),
      },
    };
  },
});
