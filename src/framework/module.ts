/**
 * Module contract
 *
 * A module owns a slice of the flat parameter bundle and computes one part of
 * a year. The runner calls `init` once, then `step` for every year in order,
 * threading the returned state into the next call and the outputs into the
 * modules that depend on them.
 *
 * `step` must be pure: same state, inputs, params and year give the same
 * result, and nothing passed in is mutated.
 */

import { YearIndex, Year, ValidationResult, ParamMetaTable } from './types.js';

/**
 * Parameters with defaults, documented ranges and a validator.
 * Every Module is a ParamGroup; display-only inputs that feed no yearly step
 * are declared as a bare group.
 */
export interface ParamGroup<TParams extends object> {
  /** Owner tag used in validation messages and introspection */
  readonly name: string;

  readonly description: string;

  readonly defaults: TParams;

  /** Range, unit and tier of every field; checked by `validate` */
  readonly paramMeta: ParamMetaTable<TParams>;

  /** Runs against the whole merged bundle before any year is computed */
  validate(params: TParams): ValidationResult;
}

/**
 * @template TParams - Bundle slice this module reads
 * @template TState - Carried from one year to the next
 * @template TInputs - Values the runner passes in from upstream modules
 * @template TOutputs - Values downstream modules and the yearly record read
 */
export interface Module<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
> extends ParamGroup<TParams> {
  /** Input keys the runner must supply */
  readonly inputs: readonly (keyof TInputs)[];

  /** Keys every `step` result carries in `outputs` */
  readonly outputs: readonly (keyof TOutputs)[];

  /** State before the first simulated year */
  init(params: TParams): TState;

  /**
   * Compute one year.
   *
   * @param year - Calendar year
   * @param yearIndex - Offset from the first simulated year (not the base year)
   */
  step(
    state: TState,
    inputs: TInputs,
    params: TParams,
    year: Year,
    yearIndex: YearIndex
  ): StepResult<TState, TOutputs>;
}

export interface StepResult<TState, TOutputs> {
  /** Passed to the next year's step */
  state: TState;
  outputs: TOutputs;
}

/**
 * Identity helper; lets TypeScript infer the four type parameters from a
 * module literal.
 */
export function defineModule<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
>(
  definition: Module<TParams, TState, TInputs, TOutputs>
): Module<TParams, TState, TInputs, TOutputs> {
  return definition;
}

/** Declare a stand-alone parameter group */
export function defineParamGroup<TParams extends object>(
  definition: ParamGroup<TParams>
): ParamGroup<TParams> {
  return definition;
}
