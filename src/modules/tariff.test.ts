/**
 * Tariff Module Tests
 *
 * Cost roll-up, diesel escalation and the retail rate floor.
 */

import { tariffModule, tariffDefaults, dieselRate, retailRate, TariffInputs } from './tariff.js';
import { DomainError } from '../framework/errors.js';

import { test, expect, printSummary } from '../test-utils.js';

// 2023 status-quo actuals
const BASE_INPUTS: TariffInputs = {
  communityLoadMWh: 40_708,
  hydroMWh: 40_200,
  dieselMWh: 508,
  debtService: 0,
  anchorRevenue: 0,
};

function runTariff(inputs: Partial<TariffInputs> = {}, year = 2023) {
  const state = tariffModule.init(tariffDefaults);
  return tariffModule.step(state, { ...BASE_INPUTS, ...inputs }, tariffDefaults, year, year - 2023).outputs;
}

// =============================================================================
// TESTS
// =============================================================================

console.log('\n=== Tariff Module Tests ===\n');

console.log('--- Diesel Rate ---\n');

test('diesel rate equals the base cost in the base year', () => {
  expect(dieselRate(tariffDefaults, 2023)).toBe(150);
});

test('diesel rate escalates annually', () => {
  expect(dieselRate(tariffDefaults, 2024)).toBeCloseTo(154.5, 9);
  expect(dieselRate(tariffDefaults, 2025)).toBeCloseTo(159.135, 9);
});

console.log('\n--- Cost Roll-up ---\n');

test('2023 costs reproduce the calibration year', () => {
  const out = runTariff();
  expect(out.hydroCost).toBe(3_738_600);
  expect(out.dieselCost).toBe(76_200);
  expect(out.totalCost).toBe(5_014_800);
  expect(out.communityCost).toBe(5_014_800);
  expect(out.retailRate).toBeCloseTo(0.1231895, 6);
});

test('debt service adds to total cost', () => {
  const out = runTariff({ debtService: 500_000 });
  expect(out.totalCost).toBe(5_514_800);
});

test('anchor revenue offsets community cost only', () => {
  const out = runTariff({ anchorRevenue: 1_000_000 });
  expect(out.totalCost).toBe(5_014_800);
  expect(out.communityCost).toBe(4_014_800);
});

test('community cost may go negative', () => {
  const out = runTariff({ anchorRevenue: 6_000_000 });
  expect(out.communityCost).toBe(-985_200);
  expect(out.retailRate).toBe(0.05);
});

console.log('\n--- Retail Rate ---\n');

test('rate is community cost per community kWh', () => {
  expect(retailRate(8_000_000, 50_000, 2030)).toBeCloseTo(0.16, 12);
});

test('rate is floored at $0.05/kWh', () => {
  expect(retailRate(1_000_000, 50_000, 2030)).toBe(0.05);
});

test('zero community load is a domain error', () => {
  expect(() => retailRate(1_000_000, 0, 2031)).toThrowError(
    DomainError,
    'Community load is zero; retail rate is undefined (year 2031)'
  );
});

test('non-finite community cost is a domain error', () => {
  expect(() => retailRate(Infinity, 50_000, 2030)).toThrowError(
    DomainError,
    'Community cost is not finite (Infinity) (year 2030)'
  );
});

test('step produces exactly the declared outputs', () => {
  expect(Object.keys(runTariff()).sort()).toEqual([...tariffModule.outputs].sort());
});

console.log('\n--- Validation ---\n');

test('defaults are valid', () => {
  expect(tariffModule.validate(tariffDefaults).valid).toBeTrue();
});

test('escalation above 6% is rejected', () => {
  const result = tariffModule.validate({ ...tariffDefaults, dieselEscalation: 0.1 });
  expect(result.errors).toEqual(['dieselEscalation must be 0-0.06 fraction/yr, got 0.1']);
});

printSummary();
