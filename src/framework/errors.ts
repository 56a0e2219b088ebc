/**
 * Typed failures raised by the scenario model.
 *
 * Every failure carries a stable `code` so callers can branch on the kind of
 * problem without parsing messages, plus optional structured `details`.
 */

import { Year } from './types.js';

export type ModelErrorCode = 'VALIDATION' | 'DOMAIN' | 'MISMATCH';

export interface ModelErrorJSON {
  name: string;
  code: ModelErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class ScenarioModelError extends Error {
  public readonly code: ModelErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ModelErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ScenarioModelError';
    this.code = code;
    this.details = details;
  }

  toJSON(): ModelErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Input outside its documented bounds: a parameter bundle, a year range,
 * a comparison window or a preset document.
 * Raised before anything that depends on the input is computed.
 */
export class ValidationError extends ScenarioModelError {
  public readonly errors: readonly string[];

  constructor(source: string, errors: readonly string[]) {
    super('VALIDATION', `[${source}] Validation failed:\n  ${errors.join('\n  ')}`, { errors: [...errors] });
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Undefined math (e.g. division by a zero load) for a range-valid bundle.
 */
export class DomainError extends ScenarioModelError {
  public readonly year: Year;

  constructor(message: string, year: Year) {
    super('DOMAIN', `${message} (year ${year})`, { year });
    this.name = 'DomainError';
    this.year = year;
  }
}

/**
 * Two result sequences that cannot be compared year-for-year.
 */
export class MismatchError extends ScenarioModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MISMATCH', message, details);
    this.name = 'MismatchError';
  }
}
