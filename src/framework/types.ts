/**
 * Core types for the simulation framework
 */

/** Year index (0 = first simulated year) */
export type YearIndex = number;

/** Absolute calendar year (e.g. 2023) */
export type Year = number;

/** Inclusive [startYear, endYear] horizon */
export type YearRange = readonly [Year, Year];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Range constraint for numeric parameters
 */
export interface Range {
  min: number;
  max: number;
  default: number;
}

/**
 * Parameter metadata for documentation and validation
 */
export interface ParamMeta {
  description: string;
  unit: string;
  range: Range;
  /** 1 = user-facing, 2 = scenario, 3 = display-only */
  tier: 1 | 2 | 3;
  /** Calibration source for the default */
  source?: string;
  /** Value must be a whole number (years, terms, counts) */
  integer?: boolean;
}

/**
 * Metadata for every key of a flat params object.
 */
export type ParamMetaTable<TParams extends object> = {
  readonly [K in keyof TParams]: ParamMeta;
};

/**
 * Output field metadata (for introspection of yearly records)
 */
export interface OutputMeta {
  unit: string;
  description: string;
  module: string;
}
