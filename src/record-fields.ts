/**
 * Yearly record fields
 *
 * Canonical list of YearlyRecord fields with unit, description and the module
 * that produces each one. `describeOutputs()` in introspection.ts is generated
 * from this table.
 */

import type { YearlyRecord } from './engine.js';
import type { OutputMeta } from './framework/types.js';

export interface RecordFieldDef extends OutputMeta {
  key: keyof YearlyRecord;
}

export const RECORD_FIELDS: readonly RecordFieldDef[] = [
  { key: 'year', unit: 'year', description: 'Simulation year', module: 'engine' },

  // Load
  { key: 'communityLoadMWh', unit: 'MWh', description: 'Existing-customer load', module: 'load' },
  { key: 'anchorLoadMWh', unit: 'MWh', description: 'Anchor customer load (0 before the expansion year)', module: 'load' },
  { key: 'totalDemandMWh', unit: 'MWh', description: 'Community plus anchor load', module: 'load' },
  { key: 'loadGrowthRate', unit: 'fraction', description: 'Community load growth vs. the prior year (0 in the first year)', module: 'load' },

  // Supply & dispatch
  { key: 'hydroCapMWh', unit: 'MWh', description: 'Hydro energy ceiling', module: 'supply' },
  { key: 'hydroMWh', unit: 'MWh', description: 'Hydro energy dispatched', module: 'dispatch' },
  { key: 'dieselMWh', unit: 'MWh', description: 'Diesel energy dispatched (never below the floor)', module: 'dispatch' },
  { key: 'dieselShare', unit: 'fraction', description: 'Diesel share of total demand', module: 'dispatch' },

  // Costs
  { key: 'dieselRate', unit: '$/MWh', description: 'Escalated all-in diesel cost', module: 'tariff' },
  { key: 'hydroCost', unit: '$', description: 'Wholesale hydro purchases', module: 'tariff' },
  { key: 'dieselCost', unit: '$', description: 'Diesel generation cost', module: 'tariff' },
  { key: 'debtService', unit: '$', description: 'Expansion debt payment', module: 'financing' },
  { key: 'anchorRevenue', unit: '$', description: 'Anchor tariff revenue', module: 'financing' },
  { key: 'totalCost', unit: '$', description: 'Fixed + hydro + diesel + debt service', module: 'tariff' },
  { key: 'communityCost', unit: '$', description: 'Total cost less anchor revenue (may be negative)', module: 'tariff' },

  // Rate
  { key: 'retailRate', unit: '$/kWh', description: 'Community retail rate, floored at $0.05/kWh', module: 'tariff' },
];
