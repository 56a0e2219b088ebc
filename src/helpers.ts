/**
 * Result Helpers
 *
 * Convenience functions for extracting data from scenario runs.
 */

import type { ScenarioRun, YearlyRecord } from './engine.js';

/** Numeric fields of a yearly record */
export type NumericField = Exclude<keyof YearlyRecord, 'year'>;

/**
 * Get the record for a specific year.
 *
 * @param records - One scenario's run
 * @param year - Year to look up (e.g., 2030)
 * @returns YearlyRecord or undefined if year not in range
 */
export function getAtYear(records: ScenarioRun, year: number): YearlyRecord | undefined {
  return records.find(r => r.year === year);
}

/**
 * Extract a time series for a specific field.
 *
 * @param records - One scenario's run
 * @param field - Field name from YearlyRecord (e.g., 'retailRate')
 * @returns Object with years and values arrays
 */
export function extractTimeSeries(
  records: ScenarioRun,
  field: NumericField
): { years: number[]; values: number[] } {
  return {
    years: records.map(r => r.year),
    values: records.map(r => r[field]),
  };
}

/**
 * Sum a field over an inclusive year window (default: the whole run).
 */
export function sumOver(
  records: ScenarioRun,
  field: NumericField,
  fromYear: number = Number.NEGATIVE_INFINITY,
  toYear: number = Number.POSITIVE_INFINITY
): number {
  let total = 0;
  for (const r of records) {
    if (r.year >= fromYear && r.year <= toYear) {
      total += r[field];
    }
  }
  return total;
}
