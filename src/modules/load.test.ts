/**
 * Load Module Tests
 *
 * Two-phase community growth, anchor load and scenario branching.
 */

import { loadModule, loadDefaults, communityLoad, anchorLoadMWh, LoadParams } from './load.js';
import { Scenario } from '../domain-types.js';

import { test, expect, printSummary } from '../test-utils.js';

function runLoad(
  scenario: Scenario,
  expansionOnline: boolean,
  year = 2027,
  overrides: Partial<LoadParams> = {}
) {
  const params = { ...loadDefaults, ...overrides };
  const state = loadModule.init(params);
  return loadModule.step(state, { scenario, expansionOnline }, params, year, year - 2023);
}

// =============================================================================
// TESTS
// =============================================================================

console.log('\n=== Load Module Tests ===\n');

console.log('--- Community Load ---\n');

test('base year load equals the calibrated baseline', () => {
  expect(communityLoad(loadDefaults, 2023)).toBe(40_708);
});

test('phase 1 grows at the adoption rate', () => {
  expect(communityLoad(loadDefaults, 2024)).toBeCloseTo(42_743.4, 6);
  expect(communityLoad(loadDefaults, 2027)).toBeCloseTo(49_480.828425, 5);
});

test('phase 2 continues from the phase-1 terminal value', () => {
  const terminal = communityLoad(loadDefaults, 2027);
  expect(communityLoad(loadDefaults, 2028)).toBeCloseTo(terminal * 1.02, 6);
  expect(communityLoad(loadDefaults, 2035)).toBeCloseTo(57_974.676804, 5);
});

test('no jump at the phase boundary', () => {
  const params = { ...loadDefaults, phase1End: 2030 };
  const before = communityLoad(params, 2030);
  const after = communityLoad(params, 2031);
  expect(after / before).toBeCloseTo(1 + params.steadyGrowthRate, 10);
});

console.log('\n--- Anchor Load ---\n');

test('anchor load is MW × CF × 8760', () => {
  expect(anchorLoadMWh(loadDefaults)).toBeCloseTo(15_768, 6);
  expect(anchorLoadMWh({ anchorMW: 4, anchorCF: 0.9 })).toBeCloseTo(31_536, 6);
});

test('anchor scenario draws anchor load once online', () => {
  const { outputs } = runLoad('expansion-with-anchor', true);
  expect(outputs.anchorLoadMWh).toBeCloseTo(15_768, 6);
  expect(outputs.totalDemandMWh).toBeCloseTo(outputs.communityLoadMWh + 15_768, 6);
});

test('anchor scenario draws nothing before the expansion', () => {
  const { outputs } = runLoad('expansion-with-anchor', false, 2026);
  expect(outputs.anchorLoadMWh).toBe(0);
  expect(outputs.totalDemandMWh).toBe(outputs.communityLoadMWh);
});

test('non-anchor scenarios never draw anchor load', () => {
  expect(runLoad('status-quo', true).outputs.anchorLoadMWh).toBe(0);
  expect(runLoad('expansion-only', true).outputs.anchorLoadMWh).toBe(0);
});

console.log('\n--- State ---\n');

test('growth rate is 0 in the first simulated year', () => {
  const { outputs, state } = runLoad('status-quo', false, 2023);
  expect(outputs.loadGrowthRate).toBe(0);
  expect(state.prevCommunityLoadMWh).toBe(40_708);
});

test('growth rate tracks the prior year', () => {
  const first = runLoad('status-quo', false, 2023);
  const second = loadModule.step(
    first.state,
    { scenario: 'status-quo', expansionOnline: false },
    loadDefaults,
    2024,
    1
  );
  expect(second.outputs.loadGrowthRate).toBeCloseTo(0.05, 10);
});

test('step produces exactly the declared outputs', () => {
  expect(Object.keys(runLoad('expansion-with-anchor', true).outputs).sort()).toEqual([...loadModule.outputs].sort());
});

console.log('\n--- Validation ---\n');

test('defaults are valid with no warnings', () => {
  const result = loadModule.validate(loadDefaults);
  expect(result.valid).toBeTrue();
  expect(result.warnings).toHaveLength(0);
});

test('steady growth above adoption growth is a warning, not an error', () => {
  const result = loadModule.validate({ ...loadDefaults, adoptionGrowthRate: 0.02, steadyGrowthRate: 0.04 });
  expect(result.valid).toBeTrue();
  expect(result.warnings).toEqual(['steadyGrowthRate 0.04 exceeds adoptionGrowthRate 0.02']);
});

test('phase1End before the base year is rejected', () => {
  const result = loadModule.validate({ ...loadDefaults, phase1End: 2020 });
  expect(result.valid).toBeFalse();
  expect(result.errors).toEqual([
    'phase1End must be 2023-2035 year, got 2020',
    'phase1End (2020) cannot precede base year 2023',
  ]);
});

test('anchor capacity factor above 0.99 is rejected', () => {
  const result = loadModule.validate({ ...loadDefaults, anchorCF: 1.2 });
  expect(result.errors).toEqual(['anchorCF must be 0.7-0.99 fraction, got 1.2']);
});

printSummary();
