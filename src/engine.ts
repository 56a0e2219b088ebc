/**
 * Scenario Engine
 *
 * Wires the modules together and runs one scenario year by year.
 *
 * Module dependency graph:
 *   supply (scenario)
 *      ↓
 *   load ← supply (expansionOnline)
 *      ↓
 *   dispatch ← load (totalDemand), supply (hydroCap)
 *      ↓
 *   financing ← supply (expansionOnline), load (anchorLoad)
 *      ↓
 *   tariff ← load, dispatch, financing
 *
 * The only state carried between years is the prior community load (for the
 * reported growth rate). Every run validates the bundle and the year range
 * up front; nothing is computed for invalid input.
 */

import { supplyModule } from './modules/supply.js';
import { loadModule } from './modules/load.js';
import { dispatchModule } from './modules/dispatch.js';
import { financingModule } from './modules/financing.js';
import { tariffModule } from './modules/tariff.js';
import { ParameterBundle, buildParams, isParamKey, validateParams } from './params.js';
import { Scenario, SCENARIOS, SCENARIO_LABELS, isScenario } from './domain-types.js';
import { BASE_YEAR, DEFAULT_YEAR_RANGE, MAX_YEAR } from './constants.js';
import { ValidationResult, YearRange } from './framework/types.js';
import { ValidationError } from './framework/errors.js';
import { combineValidation } from './framework/validated-merge.js';
import { MemoCache, stableKey } from './framework/memo.js';
import type { AllComparisons } from './compare.js';

// =============================================================================
// TYPES
// =============================================================================

export interface YearlyRecord {
  readonly year: number;

  // Load
  readonly communityLoadMWh: number;
  readonly anchorLoadMWh: number;
  readonly totalDemandMWh: number;
  readonly loadGrowthRate: number;

  // Supply & dispatch
  readonly hydroCapMWh: number;
  readonly hydroMWh: number;
  readonly dieselMWh: number;
  readonly dieselShare: number;

  // Costs
  readonly dieselRate: number;       // $/MWh
  readonly hydroCost: number;        // $
  readonly dieselCost: number;       // $
  readonly debtService: number;      // $
  readonly anchorRevenue: number;    // $
  readonly totalCost: number;        // $
  readonly communityCost: number;    // $ (may be negative)

  // Rate
  readonly retailRate: number;       // $/kWh
}

/** Ordered, gap-free, ascending records for one scenario */
export type ScenarioRun = readonly YearlyRecord[];

export type ScenarioRuns = Readonly<Record<Scenario, ScenarioRun>>;

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Check an inclusive [start, end] horizon: whole years, ordered, starting no
 * earlier than the base year growth is measured from and ending by MAX_YEAR.
 */
export function validateYearRange(yearRange: YearRange): ValidationResult {
  const errors: string[] = [];
  const [startYear, endYear] = yearRange;

  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    errors.push(`year range must be whole years, got [${startYear}, ${endYear}]`);
  } else {
    if (startYear > endYear) {
      errors.push(`year range start ${startYear} is after end ${endYear}`);
    }
    if (startYear < BASE_YEAR) {
      errors.push(`year range cannot start before base year ${BASE_YEAR}, got ${startYear}`);
    }
    if (endYear > MAX_YEAR) {
      errors.push(`year range cannot end after ${MAX_YEAR}, got ${endYear}`);
    }
  }

  return { valid: errors.length === 0, errors, warnings: [] };
}

// =============================================================================
// SIMULATION CLASS
// =============================================================================

export class ScenarioSimulation {
  private readonly params: ParameterBundle;
  private readonly scenario: Scenario;
  private readonly startYear: number;
  private readonly endYear: number;

  constructor(params: ParameterBundle, scenario: Scenario, yearRange: YearRange = DEFAULT_YEAR_RANGE) {
    this.params = params;
    this.scenario = scenario;
    this.startYear = yearRange[0];
    this.endYear = yearRange[1];
  }

  /**
   * Validate the bundle, scenario tag and year range together
   */
  validate(): ValidationResult {
    const scenarioCheck: ValidationResult = { valid: true, errors: [], warnings: [] };
    if (!isScenario(this.scenario)) {
      scenarioCheck.errors.push(
        `unknown scenario "${String(this.scenario)}" (expected one of: ${SCENARIOS.join(', ')})`
      );
    }

    return combineValidation(
      validateParams(this.params),
      scenarioCheck,
      validateYearRange([this.startYear, this.endYear])
    );
  }

  /**
   * Run the scenario over the year range. Assumes validate() passed.
   */
  run(): ScenarioRun {
    const params = this.params;
    const scenario = this.scenario;
    const records: YearlyRecord[] = [];

    // Initialize all module states
    let supplyState = supplyModule.init(params);
    let loadState = loadModule.init(params);
    let dispatchState = dispatchModule.init(params);
    let financingState = financingModule.init(params);
    let tariffState = tariffModule.init(params);

    for (let year = this.startYear; year <= this.endYear; year++) {
      const yearIndex = year - this.startYear;

      // =======================================================================
      // Step 1: Supply (scenario only)
      // =======================================================================
      const supplyResult = supplyModule.step(supplyState, { scenario }, params, year, yearIndex);
      supplyState = supplyResult.state;
      const supply = supplyResult.outputs;

      // =======================================================================
      // Step 2: Load (needs expansion status)
      // =======================================================================
      const loadResult = loadModule.step(
        loadState,
        { scenario, expansionOnline: supply.expansionOnline },
        params,
        year,
        yearIndex
      );
      loadState = loadResult.state;
      const load = loadResult.outputs;

      // =======================================================================
      // Step 3: Dispatch (needs demand, hydro cap)
      // =======================================================================
      const dispatchResult = dispatchModule.step(
        dispatchState,
        { totalDemandMWh: load.totalDemandMWh, hydroCapMWh: supply.hydroCapMWh },
        params,
        year,
        yearIndex
      );
      dispatchState = dispatchResult.state;
      const dispatch = dispatchResult.outputs;

      // =======================================================================
      // Step 4: Financing (needs expansion status, anchor load)
      // =======================================================================
      const financingResult = financingModule.step(
        financingState,
        { scenario, expansionOnline: supply.expansionOnline, anchorLoadMWh: load.anchorLoadMWh },
        params,
        year,
        yearIndex
      );
      financingState = financingResult.state;
      const financing = financingResult.outputs;

      // =======================================================================
      // Step 5: Tariff (needs load, dispatch, financing)
      // =======================================================================
      const tariffResult = tariffModule.step(
        tariffState,
        {
          communityLoadMWh: load.communityLoadMWh,
          hydroMWh: dispatch.hydroMWh,
          dieselMWh: dispatch.dieselMWh,
          debtService: financing.debtService,
          anchorRevenue: financing.anchorRevenue,
        },
        params,
        year,
        yearIndex
      );
      tariffState = tariffResult.state;
      const tariff = tariffResult.outputs;

      // =======================================================================
      // Collect record
      // =======================================================================
      records.push(Object.freeze({
        year,

        communityLoadMWh: load.communityLoadMWh,
        anchorLoadMWh: load.anchorLoadMWh,
        totalDemandMWh: load.totalDemandMWh,
        loadGrowthRate: load.loadGrowthRate,

        hydroCapMWh: supply.hydroCapMWh,
        hydroMWh: dispatch.hydroMWh,
        dieselMWh: dispatch.dieselMWh,
        dieselShare: dispatch.dieselShare,

        dieselRate: tariff.dieselRate,
        hydroCost: tariff.hydroCost,
        dieselCost: tariff.dieselCost,
        debtService: financing.debtService,
        anchorRevenue: financing.anchorRevenue,
        totalCost: tariff.totalCost,
        communityCost: tariff.communityCost,

        retailRate: tariff.retailRate,
      }));
    }

    return Object.freeze(records);
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Run one scenario. Throws ValidationError (listing every problem) before
 * computing anything, or DomainError if a year's math is undefined.
 */
export function run(
  params: ParameterBundle,
  scenario: Scenario,
  yearRange: YearRange = DEFAULT_YEAR_RANGE
): ScenarioRun {
  const sim = new ScenarioSimulation(params, scenario, yearRange);
  const validation = sim.validate();

  if (!validation.valid) {
    throw new ValidationError('engine', validation.errors);
  }

  return sim.run();
}

/**
 * Run every scenario over the same bundle and year range
 */
export function runAllScenarios(
  params: ParameterBundle,
  yearRange: YearRange = DEFAULT_YEAR_RANGE
): ScenarioRuns {
  return Object.freeze({
    'status-quo': run(params, 'status-quo', yearRange),
    'expansion-only': run(params, 'expansion-only', yearRange),
    'expansion-with-anchor': run(params, 'expansion-with-anchor', yearRange),
  });
}

// =============================================================================
// MEMOIZATION
// =============================================================================

export type RunCache = MemoCache<ScenarioRun>;

export function createRunCache(maxEntries?: number): RunCache {
  return new MemoCache<ScenarioRun>(maxEntries);
}

/**
 * Cache key: every bundle field (sorted), scenario and year range
 */
export function runCacheKey(params: ParameterBundle, scenario: Scenario, yearRange: YearRange): string {
  return stableKey({ params, scenario, yearRange: [yearRange[0], yearRange[1]] });
}

/**
 * run() through a cache. Results are the same frozen sequences run() returns;
 * failed runs are not cached.
 */
export function runMemoized(
  cache: RunCache,
  params: ParameterBundle,
  scenario: Scenario,
  yearRange: YearRange = DEFAULT_YEAR_RANGE
): ScenarioRun {
  return cache.getOrCompute(
    runCacheKey(params, scenario, yearRange),
    () => run(params, scenario, yearRange)
  );
}

/**
 * Run every scenario with the parameters (and year range) of a preset file
 */
export async function runWithPreset(
  presetPath: string,
  overrides: Partial<ParameterBundle> = {}
): Promise<{ preset: { name: string; description: string }; yearRange: YearRange; runs: ScenarioRuns }> {
  const { loadPreset, presetToParams, presetYearRange } = await import('./presets.js');

  const preset = await loadPreset(presetPath);
  const params = presetToParams(preset, overrides);
  const yearRange = presetYearRange(preset);

  return {
    preset: { name: preset.name, description: preset.description },
    yearRange,
    runs: runAllScenarios(params, yearRange),
  };
}

export interface SimulationReport {
  runs: ReadonlyArray<{ scenario: Scenario; records: ScenarioRun }>;
  /** Present when every scenario ran */
  comparison?: AllComparisons;
}

/**
 * One scenario on its own, or all of them compared against the status quo.
 * The comparison's runs are the ones reported, so each scenario runs once.
 */
export async function simulate(
  params: ParameterBundle,
  yearRange: YearRange = DEFAULT_YEAR_RANGE,
  onlyScenario?: Scenario
): Promise<SimulationReport> {
  if (onlyScenario) {
    return { runs: [{ scenario: onlyScenario, records: run(params, onlyScenario, yearRange) }] };
  }

  const { compareAll } = await import('./compare.js');
  const comparison = compareAll(params, { yearRange });
  return {
    runs: SCENARIOS.map(scenario => ({ scenario, records: comparison.runs[scenario] })),
    comparison,
  };
}

// =============================================================================
// CLI RUNNER
// =============================================================================

function printUsage() {
  console.log('Usage: npx tsx src/engine.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --preset=NAME             Run with named preset (or path to .json)');
  console.log('  --list                    List available presets');
  console.log('  --scenario=ID             Only print one scenario');
  console.log(`                            (${SCENARIOS.join(', ')})`);
  console.log('  --from=YEAR               First year (default 2023)');
  console.log('  --to=YEAR                 Last year (default 2035)');
  console.log('  --<param>=VALUE           Override any parameter, e.g. --anchorMW=3');
  console.log('  --help, -h                Show this help');
}

function printRun(label: string, records: ScenarioRun) {
  console.log(`\n=== ${label} ===\n`);
  console.log('Year  Community MWh  Anchor MWh  Hydro MWh  Diesel MWh  Debt Svc $  Rate $/kWh');
  console.log('----  ------------  ----------  ---------  ----------  ----------  ----------');
  for (const r of records) {
    console.log(
      `${r.year}  ` +
      `${r.communityLoadMWh.toFixed(0).padStart(12)}  ` +
      `${r.anchorLoadMWh.toFixed(0).padStart(10)}  ` +
      `${r.hydroMWh.toFixed(0).padStart(9)}  ` +
      `${r.dieselMWh.toFixed(0).padStart(10)}  ` +
      `${r.debtService.toFixed(0).padStart(10)}  ` +
      `${r.retailRate.toFixed(4).padStart(10)}`
    );
  }
}

async function runCLI() {
  const args = process.argv.slice(2);

  let presetName: string | undefined;
  let onlyScenario: Scenario | undefined;
  let fromYear: number | undefined;
  let toYear: number | undefined;
  const unknownFlags: string[] = [];
  const overrides: Partial<Record<keyof ParameterBundle, number>> = {};

  for (const arg of args) {
    const [flag, value] = arg.split('=', 2);

    if (arg === '--help' || arg === '-h') {
      printUsage();
      return;
    } else if (arg === '--list') {
      const { listPresets } = await import('./presets.js');
      const presets = await listPresets();
      console.log('Available presets:');
      for (const p of presets) {
        console.log(`  ${p}`);
      }
      return;
    } else if (flag === '--preset' && value) {
      presetName = value;
    } else if (flag === '--scenario' && value) {
      if (!isScenario(value)) {
        console.error(`Unknown scenario '${value}'. Expected one of: ${SCENARIOS.join(', ')}`);
        process.exit(1);
      }
      onlyScenario = value;
    } else if (flag === '--from' && value) {
      fromYear = Number(value);
    } else if (flag === '--to' && value) {
      toYear = Number(value);
    } else {
      const key = flag.startsWith('--') ? flag.slice(2) : '';
      if (isParamKey(key) && value !== undefined) {
        const parsed = Number(value);
        if (value.trim() === '' || Number.isNaN(parsed)) {
          console.error(`Invalid value for ${key}: '${value}'`);
          process.exit(1);
        }
        overrides[key] = parsed;
      } else {
        unknownFlags.push(arg);
      }
    }
  }

  if (unknownFlags.length > 0) {
    console.warn(`Warning: Unknown flags ignored: ${unknownFlags.join(', ')}`);
    console.warn('Run with --help to see available options.');
    console.warn('');
  }

  let params: ParameterBundle;
  let yearRange: YearRange = DEFAULT_YEAR_RANGE;

  if (presetName) {
    const { loadPreset, presetToParams, presetYearRange, getPresetPath } = await import('./presets.js');
    const presetPath = presetName.endsWith('.json') ? presetName : getPresetPath(presetName);
    const preset = await loadPreset(presetPath);
    params = presetToParams(preset, overrides);
    yearRange = presetYearRange(preset);
    console.log(`=== ${preset.name} ===`);
    console.log(preset.description);
  } else {
    params = buildParams(overrides);
  }

  yearRange = [fromYear ?? yearRange[0], toYear ?? yearRange[1]];

  const { runs, comparison } = await simulate(params, yearRange, onlyScenario);

  for (const { scenario, records } of runs) {
    printRun(SCENARIO_LABELS[scenario], records);
  }

  if (comparison) {
    console.log('\n=== Comparison vs Status Quo ===\n');
    for (const [label, c] of [
      [SCENARIO_LABELS['expansion-only'], comparison.expansionOnly],
      [SCENARIO_LABELS['expansion-with-anchor'], comparison.expansionWithAnchor],
    ] as const) {
      console.log(`${label} (${c.fromYear}-${c.toYear}):`);
      console.log(`  Diesel avoided:        ${c.dieselAvoidedMWh.toFixed(0)} MWh`);
      console.log(`  Diesel cost saved:     $${c.dieselCostSaved.toFixed(0)}`);
      console.log(`  CO2 avoided:           ${c.co2Tonnes.toFixed(0)} t`);
      console.log(`  Barrels avoided:       ${c.barrelsAvoided.toFixed(0)}`);
      console.log(`  Savings per household: $${c.householdSavings.toFixed(0)}`);
      console.log(`  Community-wide:        $${c.communitySavings.toFixed(0)}`);
    }
  }
}

if (process.argv[1]?.endsWith('engine.ts') || process.argv[1]?.endsWith('engine.js')) {
  runCLI().catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
