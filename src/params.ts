/**
 * Parameter Bundle
 *
 * The 23 user-adjustable inputs, flattened into one immutable record.
 * Each field is owned by exactly one module (or the community group), which
 * supplies its default, documented range and validation.
 *
 * Usage:
 *   const params = buildParams({ anchorMW: 3 });   // merged, validated, frozen
 *   params.anchorMW = 4;                           // TypeError at runtime, error in TS
 */

import { ValidationResult } from './framework/types.js';
import { collectParamMeta, OwnedParamMeta } from './framework/introspect.js';
import { combineValidation, validatedMerge } from './framework/validated-merge.js';
import { ValidationError } from './framework/errors.js';
import { supplyModule, SupplyParams } from './modules/supply.js';
import { loadModule, LoadParams } from './modules/load.js';
import { dispatchModule, DispatchParams } from './modules/dispatch.js';
import { financingModule, FinancingParams } from './modules/financing.js';
import { tariffModule, TariffParams } from './modules/tariff.js';
import { communityGroup, CommunityParams } from './modules/community.js';

// =============================================================================
// TYPES
// =============================================================================

export type ParameterBundle = Readonly<
  LoadParams &
  SupplyParams &
  DispatchParams &
  FinancingParams &
  TariffParams &
  CommunityParams
>;

export type ParamKey = keyof ParameterBundle;

// =============================================================================
// DEFAULTS & METADATA
// =============================================================================

export const defaultParams: ParameterBundle = Object.freeze({
  ...loadModule.defaults,
  ...supplyModule.defaults,
  ...dispatchModule.defaults,
  ...financingModule.defaults,
  ...tariffModule.defaults,
  ...communityGroup.defaults,
});

/** Every bundle field, in declaration order */
export const PARAM_KEYS = Object.keys(defaultParams) as ParamKey[];

/** Field metadata across all groups, keyed by field name */
export const PARAM_META: Readonly<Record<string, OwnedParamMeta>> = Object.freeze({
  ...collectParamMeta(loadModule),
  ...collectParamMeta(supplyModule),
  ...collectParamMeta(dispatchModule),
  ...collectParamMeta(financingModule),
  ...collectParamMeta(tariffModule),
  ...collectParamMeta(communityGroup),
});

export function isParamKey(key: string): key is ParamKey {
  return (PARAM_KEYS as readonly string[]).includes(key);
}

// =============================================================================
// VALIDATION
// =============================================================================

function prefixed(name: string, result: ValidationResult): ValidationResult {
  return {
    valid: result.valid,
    errors: result.errors.map(e => `${name}: ${e}`),
    warnings: result.warnings.map(w => `${name}: ${w}`),
  };
}

/**
 * Validate a whole bundle: every group's ranges and invariants, unknown
 * fields, and cross-group checks. Collects every problem before returning.
 */
export function validateParams(params: ParameterBundle): ValidationResult {
  const unknown: ValidationResult = { valid: true, errors: [], warnings: [] };
  for (const key of Object.keys(params)) {
    if (!isParamKey(key)) {
      unknown.errors.push(`unknown parameter "${key}"`);
    }
  }

  const crossChecks: ValidationResult = { valid: true, errors: [], warnings: [] };
  if (params.anchorTariffKWh * 1000 < params.seapaRate) {
    crossChecks.warnings.push(
      `anchor tariff $${params.anchorTariffKWh}/kWh is below the wholesale hydro rate $${params.seapaRate}/MWh`
    );
  }

  return combineValidation(
    unknown,
    prefixed(loadModule.name, loadModule.validate(params)),
    prefixed(supplyModule.name, supplyModule.validate(params)),
    prefixed(dispatchModule.name, dispatchModule.validate(params)),
    prefixed(financingModule.name, financingModule.validate(params)),
    prefixed(tariffModule.name, tariffModule.validate(params)),
    prefixed(communityGroup.name, communityGroup.validate(params)),
    crossChecks
  );
}

/**
 * Throw ValidationError unless the bundle is valid. Does not log warnings.
 */
export function assertValidParams(params: ParameterBundle): void {
  const result = validateParams(params);
  if (!result.valid) {
    throw new ValidationError('params', result.errors);
  }
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Merge overrides onto the defaults, validate the whole bundle and freeze it.
 * Throws ValidationError listing every violation.
 */
export function buildParams(overrides: Partial<ParameterBundle> = {}): ParameterBundle {
  return validatedMerge<ParameterBundle>(
    'params',
    validateParams,
    (partial) => ({ ...defaultParams, ...partial }),
    overrides
  );
}
