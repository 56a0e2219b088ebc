/**
 * Range checks driven by ParamMeta tables.
 *
 * Every field is checked; the caller gets the full list of violations
 * rather than the first one.
 */

import { ParamMetaTable, ValidationResult } from './types.js';

/**
 * Check each field of `params` against its documented range.
 *
 * Rejects non-numbers, NaN/Infinity, values outside [min, max] and
 * non-integers where the metadata asks for whole numbers.
 */
export function checkRanges<TParams extends object>(
  params: TParams,
  meta: ParamMetaTable<TParams>
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const key of Object.keys(meta) as Array<keyof TParams & string>) {
    const value: unknown = params[key];
    const { range, integer, unit } = meta[key];

    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${key} must be a finite number, got ${String(value)}`);
      continue;
    }
    if (value < range.min || value > range.max) {
      errors.push(`${key} must be ${range.min}-${range.max} ${unit}, got ${value}`);
    }
    if (integer && !Number.isInteger(value)) {
      errors.push(`${key} must be a whole number, got ${value}`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

