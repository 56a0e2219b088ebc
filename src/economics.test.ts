/**
 * Anchor & Community Economics Tests
 */

import {
  anchorEconomics,
  classifyCoverage,
  cumulativeCoverage,
  householdBills,
  rateOutlook,
  cheapestScenario,
  economicImpact,
} from './economics.js';
import { runAllScenarios } from './engine.js';
import { buildParams, defaultParams } from './params.js';
import { ValidationError } from './framework/errors.js';

import { test, expect, printSummary } from './test-utils.js';

const runs = runAllScenarios(defaultParams);

// =============================================================================
// TESTS
// =============================================================================

console.log('\n=== Economics Tests ===\n');

console.log('--- Anchor Coverage ---\n');

test('default anchor margin covers three quarters of debt service', () => {
  const e = anchorEconomics(defaultParams);
  expect(e.anchorLoadMWh).toBeCloseTo(15_768, 6);
  expect(e.tariffPerMWh).toBeCloseTo(120, 9);
  expect(e.marginPerMWh).toBeCloseTo(27, 9);
  expect(e.annualRevenue).toBeCloseTo(1_892_160, 4);
  expect(e.annualMargin).toBeCloseTo(425_736, 4);
  expect(e.debtService).toBeCloseTo(567_619.658394, 5);
  expect(e.coverageRatio).toBeCloseTo(0.750037, 6);
  expect(e.uncoveredDebt).toBeCloseTo(141_883.658394, 4);
  expect(e.viability).toBe('substantial');
  expect(e.surplus).toBeFalse();
  expect(e.tariffBelowCost).toBeFalse();
});

test('large anchor at a higher tariff over-covers the debt', () => {
  const e = anchorEconomics(buildParams({ anchorMW: 4, anchorTariffKWh: 0.14 }));
  expect(e.annualMargin).toBeCloseTo(1_482_192, 4);
  expect(e.coverageRatio).toBeCloseTo(2.611241, 6);
  expect(e.viability).toBe('full');
  expect(e.surplus).toBeTrue();
  expect(e.uncoveredDebt).toBe(0);
});

test('zero-interest financing still has debt to cover', () => {
  const e = anchorEconomics(buildParams({ financingRate: 0 }));
  expect(e.debtService).toBeCloseTo(320_000, 9);
  expect(e.coverageRatio).toBeCloseTo(1.330425, 6);
});

test('tariff below the hydro rate gives a negative margin', () => {
  const e = anchorEconomics({ ...defaultParams, anchorTariffKWh: 0.08 });
  expect(e.tariffBelowCost).toBeTrue();
  expect(e.marginPerMWh).toBeCloseTo(-13, 9);
  expect(e.coverageRatio).toBeLessThan(0);
  expect(e.viability).toBe('partial');
});

test('viability thresholds', () => {
  expect(classifyCoverage(0.9)).toBe('full');
  expect(classifyCoverage(0.89)).toBe('substantial');
  expect(classifyCoverage(0.5)).toBe('substantial');
  expect(classifyCoverage(0.49)).toBe('partial');
});

console.log('\n--- Cumulative Coverage ---\n');

test('one point per year from the expansion year', () => {
  const points = cumulativeCoverage(defaultParams);
  expect(points).toHaveLength(9);
  expect(points[0].year).toBe(2027);
  expect(points[0].cumulativeMargin).toBeCloseTo(425_736, 4);
  expect(points[8].year).toBe(2035);
  expect(points[8].cumulativeMargin).toBeCloseTo(3_831_624, 3);
  expect(points[8].cumulativeDebt).toBeCloseTo(5_108_576.925545, 3);
});

test('range starting after the expansion counts years already online', () => {
  const points = cumulativeCoverage(defaultParams, [2030, 2035]);
  expect(points).toHaveLength(6);
  expect(points[0].year).toBe(2030);
  expect(points[0].cumulativeMargin).toBeCloseTo(1_702_944, 3);
});

test('range ending before the expansion is empty', () => {
  expect(cumulativeCoverage(defaultParams, [2023, 2026])).toHaveLength(0);
});

test('invalid range is rejected', () => {
  expect(() => cumulativeCoverage(defaultParams, [2035, 2030])).toThrowError(
    ValidationError,
    'year range start 2035 is after end 2030'
  );
});

console.log('\n--- Household Bills ---\n');

test('bill is rate times household consumption', () => {
  const bills = householdBills(runs['status-quo'], 9_000, [2023]);
  expect(bills).toHaveLength(1);
  expect(bills[0].bill).toBeCloseTo(1_108.705905, 5);
});

test('defaults to every year of the run', () => {
  const bills = householdBills(runs['expansion-with-anchor'], 9_000);
  expect(bills).toHaveLength(13);
  expect(bills[12].year).toBe(2035);
  expect(bills[12].bill).toBeCloseTo(1_049.066872, 5);
});

test('missing years are reported together', () => {
  expect(() => householdBills(runs['status-quo'], 9_000, [2020, 2030, 2040])).toThrowError(
    ValidationError,
    'no record for year 2020\n  no record for year 2040'
  );
});

console.log('\n--- Rate Outlook ---\n');

test('2035 outlook against the observed 2023 rate', () => {
  const outlook = rateOutlook(runs, 2035);
  expect(outlook['status-quo'].rate).toBeCloseTo(0.150755, 6);
  expect(outlook['status-quo'].changePct).toBeCloseTo(0.223660, 6);
  expect(outlook['expansion-only'].change).toBeCloseTo(0.000706, 6);
  expect(outlook['expansion-with-anchor'].change).toBeCloseTo(-0.006637, 6);
  expect(outlook['expansion-with-anchor'].changePct).toBeCloseTo(-0.053872, 6);
});

test('custom base rate', () => {
  const outlook = rateOutlook(runs, 2035, 0.15);
  expect(outlook['status-quo'].change).toBeCloseTo(0.000755, 6);
});

test('year outside the runs is rejected', () => {
  expect(() => rateOutlook(runs, 2040)).toThrowError(
    ValidationError,
    'status-quo run has no record for year 2040'
  );
});

test('anchor scenario is cheapest by 2035', () => {
  expect(cheapestScenario(runs, 2035)).toBe('expansion-with-anchor');
});

test('tie goes to the first scenario listed', () => {
  expect(cheapestScenario(runs, 2023)).toBe('status-quo');
});

console.log('\n--- Economic Impact ---\n');

test('jobs and payroll scale with anchor size', () => {
  const impact = economicImpact(defaultParams);
  expect(impact.anchorMW).toBe(2);
  expect(impact.constructionJobs).toBe(12);
  expect(impact.operatingJobs).toBe(3);
  expect(impact.operatingPayroll).toBe(225_000);
  expect(impact.constructionPayroll).toBe(780_000);
  expect(impact.localEconomicActivity).toBeCloseTo(1_708_500, 6);
  expect(impact.annualTariffRevenue).toBeCloseTo(1_892_160, 4);
  expect(impact.anchorMargin).toBeCloseTo(425_736, 4);
});

test('local multiplier applies to both payrolls', () => {
  const impact = economicImpact(buildParams({ localMultiplier: 1.0 }));
  expect(impact.localEconomicActivity).toBe(1_005_000);
});

printSummary();
