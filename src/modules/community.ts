/**
 * Community Parameters
 *
 * Household and local-economy inputs. None of these feed the yearly step;
 * they scale comparison results (household savings) and the anchor's
 * economic-impact figures.
 */

import { defineParamGroup, ParamGroup } from '../framework/module.js';
import { ValidationResult } from '../framework/types.js';
import { checkRanges } from '../framework/param-check.js';

export interface CommunityParams {
  /** Residential accounts */
  households: number;

  /** Average household consumption (kWh/yr) */
  householdKWh: number;

  /** Local spending multiplier on anchor payroll */
  localMultiplier: number;

  /** Operating jobs per anchor MW */
  jobsPerMW: number;
}

export const communityDefaults: CommunityParams = {
  households: 1_174,          // EIA-861 2023 residential customer count
  householdKWh: 9_000,
  localMultiplier: 1.7,
  jobsPerMW: 1.5,
};

export const communityGroup: ParamGroup<CommunityParams> = defineParamGroup({
  name: 'community',
  description: 'Household counts and local-economy multipliers',

  defaults: communityDefaults,

  paramMeta: {
    households: {
      description: 'Residential accounts.',
      unit: 'accounts',
      range: { min: 500, max: 3_000, default: 1_174 },
      tier: 3,
      integer: true,
      source: 'EIA-861 2023',
    },
    householdKWh: {
      description: 'Average household consumption.',
      unit: 'kWh/yr',
      range: { min: 3_000, max: 20_000, default: 9_000 },
      tier: 3,
    },
    localMultiplier: {
      description: 'Local spending multiplier on anchor payroll.',
      unit: '×',
      range: { min: 1.0, max: 2.5, default: 1.7 },
      tier: 3,
    },
    jobsPerMW: {
      description: 'Data center operating jobs per MW.',
      unit: 'jobs/MW',
      range: { min: 0.5, max: 5.0, default: 1.5 },
      tier: 3,
    },
  },

  validate(params: CommunityParams): ValidationResult {
    return checkRanges(params, this.paramMeta);
  },
});
