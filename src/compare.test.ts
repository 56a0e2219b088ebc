/**
 * Scenario Comparison Tests
 */

import { compareScenarios, compareAll } from './compare.js';
import { ScenarioRun, YearlyRecord } from './engine.js';
import { defaultParams, buildParams } from './params.js';
import { MismatchError, ValidationError } from './framework/errors.js';

import { test, expect, printSummary } from './test-utils.js';

function record(year: number, fields: Partial<YearlyRecord>): YearlyRecord {
  return {
    year,
    communityLoadMWh: 50_000,
    anchorLoadMWh: 0,
    totalDemandMWh: 50_000,
    loadGrowthRate: 0,
    hydroCapMWh: 40_200,
    hydroMWh: 0,
    dieselMWh: 0,
    dieselShare: 0,
    dieselRate: 150,
    hydroCost: 0,
    dieselCost: 0,
    debtService: 0,
    anchorRevenue: 0,
    totalCost: 0,
    communityCost: 0,
    retailRate: 0.1,
    ...fields,
  };
}

const baseline: ScenarioRun = [
  record(2030, { dieselMWh: 1_000, dieselCost: 150_000, retailRate: 0.15 }),
  record(2031, { dieselMWh: 1_200, dieselCost: 180_000, retailRate: 0.16 }),
];

const alternative: ScenarioRun = [
  record(2030, { dieselMWh: 200, dieselCost: 30_000, retailRate: 0.12 }),
  record(2031, { dieselMWh: 200, dieselCost: 31_000, retailRate: 0.11 }),
];

const household = { householdKWh: 9_000, households: 100 };

// =============================================================================
// TESTS
// =============================================================================

console.log('\n=== Comparison Tests ===\n');

console.log('--- compareScenarios ---\n');

test('sums diesel and cost differences over the runs', () => {
  const c = compareScenarios(baseline, alternative, household);
  expect(c.fromYear).toBe(2030);
  expect(c.toYear).toBe(2031);
  expect(c.dieselAvoidedMWh).toBe(1_800);
  expect(c.dieselCostSaved).toBe(269_000);
});

test('per-year rate deltas are baseline minus comparison', () => {
  const c = compareScenarios(baseline, alternative, household);
  expect(c.rateDeltas).toHaveLength(2);
  expect(c.rateDeltas[0].year).toBe(2030);
  expect(c.rateDeltas[0].delta).toBeCloseTo(0.03, 12);
  expect(c.rateDeltas[1].delta).toBeCloseTo(0.05, 12);
});

test('household and community savings', () => {
  const c = compareScenarios(baseline, alternative, household);
  expect(c.householdSavings).toBeCloseTo(720, 9);
  expect(c.communitySavings).toBeCloseTo(72_000, 7);
});

test('emissions proxies scale with diesel avoided', () => {
  const c = compareScenarios(baseline, alternative, household);
  expect(c.co2Tonnes).toBeCloseTo(1_260, 9);
  expect(c.barrelsAvoided).toBeCloseTo(105_324.751317, 5);
});

test('window restricts the sums but not the rate deltas', () => {
  const c = compareScenarios(baseline, alternative, { ...household, fromYear: 2031 });
  expect(c.dieselAvoidedMWh).toBe(1_000);
  expect(c.dieselCostSaved).toBe(149_000);
  expect(c.householdSavings).toBeCloseTo(450, 9);
  expect(c.rateDeltas).toHaveLength(2);
});

test('comparing a run to itself yields zeros', () => {
  const c = compareScenarios(baseline, baseline, household);
  expect(c.dieselAvoidedMWh).toBe(0);
  expect(c.householdSavings).toBe(0);
  expect(c.barrelsAvoided).toBe(0);
});

test('a costlier comparison gives negative savings', () => {
  const c = compareScenarios(alternative, baseline, household);
  expect(c.dieselAvoidedMWh).toBe(-1_800);
  expect(c.householdSavings).toBeCloseTo(-720, 9);
});

console.log('\n--- Mismatches ---\n');

test('different lengths are a MismatchError', () => {
  expect(() => compareScenarios(baseline, alternative.slice(0, 1), household)).toThrowError(
    MismatchError,
    'Cannot compare runs of different lengths (2 vs 1 years)'
  );
});

test('different years are a MismatchError', () => {
  const shifted: ScenarioRun = [record(2030, {}), record(2032, {})];
  expect(() => compareScenarios(baseline, shifted, household)).toThrowError(
    MismatchError,
    'Runs disagree on year at position 1 (2031 vs 2032)'
  );
});

test('empty runs are rejected', () => {
  expect(() => compareScenarios([], [], household)).toThrowError(ValidationError, 'cannot compare empty runs');
});

test('window outside the runs is rejected', () => {
  expect(() => compareScenarios(baseline, alternative, { ...household, toYear: 2035 })).toThrowError(
    ValidationError,
    "window [2030, 2035] is outside the runs' years [2030, 2031]"
  );
});

test('window errors are not reported as parameter errors', () => {
  expect(() => compareScenarios(baseline, alternative, { ...household, toYear: 2035 })).toThrowError(
    ValidationError,
    "[compare] Validation failed:\n  window [2030, 2035] is outside the runs' years [2030, 2031]"
  );
});

test('inverted window is rejected', () => {
  expect(() =>
    compareScenarios(baseline, alternative, { ...household, fromYear: 2031, toYear: 2030 })
  ).toThrowError(ValidationError, 'window start 2031 is after end 2030');
});

console.log('\n--- compareAll ---\n');

const all = compareAll(defaultParams);

test('default window runs from the expansion year to the end', () => {
  expect(all.expansionOnly.fromYear).toBe(2027);
  expect(all.expansionOnly.toYear).toBe(2035);
  expect(all.expansionOnly.rateDeltas).toHaveLength(13);
});

test('both expansion futures displace the same diesel', () => {
  expect(all.expansionOnly.dieselAvoidedMWh).toBeCloseTo(119_067.095750, 5);
  expect(all.expansionWithAnchor.dieselAvoidedMWh).toBeCloseTo(119_067.095750, 5);
  expect(all.expansionOnly.dieselCostSaved).toBeCloseTo(23_049_130.894577, 3);
});

test('anchor adds household savings on top of the expansion', () => {
  expect(all.expansionOnly.householdSavings).toBeCloseTo(1_119.837231, 5);
  expect(all.expansionWithAnchor.householdSavings).toBeCloseTo(1_764.533683, 5);
  expect(all.expansionWithAnchor.communitySavings).toBeCloseTo(2_071_562.543723, 3);
});

test('pre-expansion years add nothing to the totals', () => {
  const wide = compareAll(defaultParams, { fromYear: 2023 });
  expect(wide.expansionOnly.dieselAvoidedMWh).toBeCloseTo(all.expansionOnly.dieselAvoidedMWh, 6);
  expect(wide.expansionWithAnchor.householdSavings).toBeCloseTo(all.expansionWithAnchor.householdSavings, 9);
});

test('range ending before the expansion clips the window to its last year', () => {
  const early = compareAll(defaultParams, { yearRange: [2023, 2025] });
  expect(early.expansionOnly.fromYear).toBe(2025);
  expect(early.expansionOnly.toYear).toBe(2025);
  expect(early.expansionOnly.dieselAvoidedMWh).toBe(0);
  expect(early.expansionWithAnchor.householdSavings).toBe(0);
});

test('household parameters come from the bundle', () => {
  const params = buildParams({ households: 2_000 });
  const c = compareAll(params);
  expect(c.expansionOnly.communitySavings).toBeCloseTo(c.expansionOnly.householdSavings * 2_000, 6);
});

printSummary();
