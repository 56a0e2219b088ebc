/**
 * Result Helper Tests
 */

import { getAtYear, extractTimeSeries, sumOver } from './helpers.js';
import { run } from './engine.js';
import { defaultParams } from './params.js';
import { isScenario, hasAnchor, hasExpansion } from './domain-types.js';

import { test, expect, printSummary } from './test-utils.js';

const records = run(defaultParams, 'status-quo', [2023, 2025]);

// =============================================================================
// TESTS
// =============================================================================

console.log('\n=== Helper Tests ===\n');

test('getAtYear finds a record or returns undefined', () => {
  expect(getAtYear(records, 2024)?.year).toBe(2024);
  expect(getAtYear(records, 2030)).toBe(undefined);
});

test('extractTimeSeries pairs years with values', () => {
  const series = extractTimeSeries(records, 'dieselRate');
  expect(series.years).toEqual([2023, 2024, 2025]);
  expect(series.values[0]).toBe(150);
  expect(series.values[2]).toBeCloseTo(159.135, 9);
});

test('sumOver respects the window', () => {
  expect(sumOver(records, 'hydroMWh')).toBe(120_600);
  expect(sumOver(records, 'dieselMWh', 2023, 2023)).toBe(508);
  expect(sumOver(records, 'dieselMWh', 2024)).toBeCloseTo(2_543.4 + 4_680.57, 6);
});

test('scenario tags', () => {
  expect(isScenario('expansion-only')).toBeTrue();
  expect(isScenario('wind-farm')).toBeFalse();
  expect(hasExpansion('status-quo')).toBeFalse();
  expect(hasExpansion('expansion-with-anchor')).toBeTrue();
  expect(hasAnchor('expansion-only')).toBeFalse();
  expect(hasAnchor('expansion-with-anchor')).toBeTrue();
});

printSummary();
