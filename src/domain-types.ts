/**
 * Domain-specific types for the utility expansion model.
 *
 * These are separated from framework/types.ts to keep the framework
 * fully domain-independent and reusable.
 */

/** The three futures the model compares */
export type Scenario = 'status-quo' | 'expansion-only' | 'expansion-with-anchor';
export const SCENARIOS: readonly Scenario[] = ['status-quo', 'expansion-only', 'expansion-with-anchor'];

export const SCENARIO_LABELS: Record<Scenario, string> = {
  'status-quo': 'Status Quo',
  'expansion-only': 'Expansion Only',
  'expansion-with-anchor': 'Expansion + Anchor',
};

/** New hydro capacity comes online in this scenario */
export function hasExpansion(scenario: Scenario): boolean {
  switch (scenario) {
    case 'status-quo':
      return false;
    case 'expansion-only':
    case 'expansion-with-anchor':
      return true;
  }
}

/** An anchor customer takes load (and pays a tariff) in this scenario */
export function hasAnchor(scenario: Scenario): boolean {
  switch (scenario) {
    case 'status-quo':
    case 'expansion-only':
      return false;
    case 'expansion-with-anchor':
      return true;
  }
}

export function isScenario(value: string): value is Scenario {
  return (SCENARIOS as readonly string[]).includes(value);
}
