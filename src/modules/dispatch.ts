/**
 * Dispatch Module
 *
 * Merit order dispatch - hydro first, diesel fills the gap.
 *
 * Hydro is the cheaper source and is limited only by its annual energy cap.
 * Diesel covers whatever the cap cannot, but never runs below an operational
 * floor (test runs, peaks, outages). The floor is a lower bound on diesel,
 * not extra energy: hydro gives up the difference, so generation always
 * equals demand exactly.
 *
 * Inputs (from other modules):
 * - totalDemandMWh: community + anchor (from load)
 * - hydroCapMWh: hydro energy ceiling (from supply)
 *
 * Outputs (to other modules):
 * - hydroMWh: hydro dispatched (MWh)
 * - dieselMWh: diesel dispatched (MWh)
 * - dieselShare: diesel fraction of demand
 */

import { defineModule, Module } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface DispatchParams {
  /** Minimum diesel generation regardless of hydro sufficiency (MWh/yr) */
  dieselFloorMWh: number;
}

export const dispatchDefaults: DispatchParams = {
  dieselFloorMWh: 200,
};

// =============================================================================
// STATE
// =============================================================================

/** Dispatch module has no persistent state - pure function of inputs */
export interface DispatchState {}

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface DispatchInputs {
  totalDemandMWh: number;
  hydroCapMWh: number;
}

export interface DispatchOutputs {
  hydroMWh: number;
  dieselMWh: number;
  dieselShare: number;
}

// =============================================================================
// HELPER: Two-source merit order
// =============================================================================

export interface DispatchSplit {
  hydroMWh: number;
  dieselMWh: number;
}

/**
 * Split demand between hydro and diesel.
 *
 * diesel = max(floor, demand − cap); hydro = demand − diesel.
 */
export function meritOrderDispatch(
  demandMWh: number,
  hydroCapMWh: number,
  dieselFloorMWh: number
): DispatchSplit {
  const dieselMWh = Math.max(dieselFloorMWh, demandMWh - hydroCapMWh);
  return {
    hydroMWh: demandMWh - dieselMWh,
    dieselMWh,
  };
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const dispatchModule: Module<
  DispatchParams,
  DispatchState,
  DispatchInputs,
  DispatchOutputs
> = defineModule({
  name: 'dispatch',
  description: 'Hydro-first merit order dispatch with a diesel floor',

  defaults: dispatchDefaults,

  inputs: ['totalDemandMWh', 'hydroCapMWh'] as const,

  outputs: ['hydroMWh', 'dieselMWh', 'dieselShare'] as const,

  paramMeta: {
    dieselFloorMWh: {
      description: 'Diesel operational floor (testing, peaks, outages).',
      unit: 'MWh/yr',
      range: { min: 0, max: 2_000, default: 200 },
      tier: 1,
    },
  },

  validate(params: DispatchParams): ValidationResult {
    return checkRanges(params, this.paramMeta);
  },

  init(_params: DispatchParams): DispatchState {
    return {};
  },

  step(_state, inputs, params, _year, _yearIndex) {
    const { totalDemandMWh, hydroCapMWh } = inputs;

    const { hydroMWh, dieselMWh } = meritOrderDispatch(
      totalDemandMWh,
      hydroCapMWh,
      params.dieselFloorMWh
    );

    return {
      state: {},
      outputs: {
        hydroMWh,
        dieselMWh,
        dieselShare: totalDemandMWh > 0 ? dieselMWh / totalDemandMWh : 0,
      },
    };
  },
});
