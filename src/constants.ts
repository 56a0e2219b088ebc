/**
 * Fixed model constants
 *
 * Calibrated once from EIA-861 (2023) / EIA-860 (2025) and public wholesale
 * supplier filings. Not user-adjustable.
 */

import { YearRange } from './framework/types.js';

/** Year all compound growth is measured from */
export const BASE_YEAR = 2023;

/** Default projection horizon (inclusive) */
export const DEFAULT_YEAR_RANGE: YearRange = [2023, 2035];

/** Last year a run may reach */
export const MAX_YEAR = 2100;

/** Regulatory minimum retail rate ($/kWh) */
export const RATE_FLOOR = 0.05;

export const HOURS_PER_YEAR = 8760;
export const KWH_PER_MWH = 1000;

/** Tonnes CO2 per MWh of diesel generation */
export const CO2_TONNES_PER_MWH = 0.7;

/** MWh of electricity per barrel of diesel burned */
export const MWH_PER_BARREL = 0.01709;

/** Observed 2023 retail rate: $5,010,000 revenue / 40,708,000 kWh */
export const BASE_RETAIL_RATE = 0.1232;

// Anchor build-out labor assumptions (economic impact table)
export const CONSTRUCTION_JOBS_PER_MW = 6;
export const OPERATING_SALARY = 75_000;
export const CONSTRUCTION_SALARY = 65_000;
