/**
 * anchor-rate-sim - Utility expansion scenario engine
 *
 * Main entry point for programmatic use.
 */

// Engine
export {
  run,
  runAllScenarios,
  runMemoized,
  runWithPreset,
  simulate,
  createRunCache,
  runCacheKey,
  validateYearRange,
  ScenarioSimulation,
} from './engine.js';
export type { YearlyRecord, ScenarioRun, ScenarioRuns, RunCache, SimulationReport } from './engine.js';

// Parameters
export { buildParams, validateParams, assertValidParams, defaultParams, PARAM_KEYS, PARAM_META, isParamKey } from './params.js';
export type { ParameterBundle, ParamKey } from './params.js';

// Scenarios
export { SCENARIOS, SCENARIO_LABELS, hasExpansion, hasAnchor, isScenario } from './domain-types.js';
export type { Scenario } from './domain-types.js';

// Comparison
export { compareScenarios, compareAll } from './compare.js';
export type { CompareOptions, CompareAllOptions, ComparisonResult, AllComparisons, RateDelta } from './compare.js';

// Economics
export {
  anchorEconomics,
  classifyCoverage,
  cumulativeCoverage,
  householdBills,
  rateOutlook,
  cheapestScenario,
  economicImpact,
} from './economics.js';
export type {
  AnchorEconomics,
  Viability,
  CoveragePoint,
  HouseholdBill,
  RateOutlookEntry,
  EconomicImpact,
} from './economics.js';

// Presets
export { loadPreset, parsePreset, presetToParams, presetYearRange, loadPresetAsParams, listPresets, getPresetPath } from './presets.js';
export type { Preset } from './presets.js';

// Modules (for advanced use)
export { supplyModule, supplyDefaults } from './modules/supply.js';
export { loadModule, loadDefaults, communityLoad, anchorLoadMWh } from './modules/load.js';
export { dispatchModule, dispatchDefaults, meritOrderDispatch } from './modules/dispatch.js';
export { financingModule, financingDefaults, annualDebtService, anchorTariffPerMWh } from './modules/financing.js';
export { tariffModule, tariffDefaults, dieselRate, retailRate } from './modules/tariff.js';
export { communityGroup, communityDefaults } from './modules/community.js';

// Primitives
export { compound, twoPhaseCompound, annuityPayment, sumBy } from './primitives/math.js';

// Constants
export * from './constants.js';

// Agent introspection
export { describeParameters, describeOutputs, listParameters, buildParamsFromEntries } from './introspection.js';
export type { ParameterInfo, ParameterSchema, OutputInfo, OutputSchema } from './introspection.js';
export { RECORD_FIELDS } from './record-fields.js';

// Framework: module contract, validation, errors, memo cache
export * from './framework/index.js';

// Result helpers
export { getAtYear, extractTimeSeries, sumOver } from './helpers.js';
