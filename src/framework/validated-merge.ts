/**
 * Validate-on-Construct Pattern
 *
 * Parameters are validated at construction time, so invalid params never
 * exist. Bundles come back frozen.
 */

import { ValidationResult } from './types.js';
import { ValidationError } from './errors.js';

/**
 * Wraps a merge + validate into a single operation.
 * Throws ValidationError on errors, logs warnings to console.
 *
 * @param source - Name used to prefix warnings and errors
 * @param validateFn - Validates the fully merged params
 * @param mergeFn - Merges partial params with defaults
 * @param partial - Partial params to merge
 * @returns Fully merged, validated and frozen params
 */
export function validatedMerge<TParams extends object>(
  source: string,
  validateFn: (params: TParams) => ValidationResult,
  mergeFn: (partial: Partial<TParams>) => TParams,
  partial: Partial<TParams>
): Readonly<TParams> {
  const merged = mergeFn(partial);

  const result = validateFn(merged);

  if (result.warnings.length > 0) {
    for (const warning of result.warnings) {
      console.warn(`[${source}] Warning: ${warning}`);
    }
  }

  if (!result.valid) {
    throw new ValidationError(source, result.errors);
  }

  return Object.freeze(merged);
}

/**
 * Fold several validation results into one.
 */
export function combineValidation(...results: ValidationResult[]): ValidationResult {
  const errors = results.flatMap(r => r.errors);
  const warnings = results.flatMap(r => r.warnings);
  return { valid: errors.length === 0, errors, warnings };
}
