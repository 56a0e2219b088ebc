/**
 * Agent Introspection
 *
 * Parameter and output schemas for agents, form builders and the CLI below,
 * derived from module `paramMeta` and RECORD_FIELDS.
 *
 *   describeParameters().anchorMW
 *   // { type: 'number', default: 2, min: 0.5, max: 5, unit: 'MW', module: 'load', ... }
 */

import { generateParameterSchema, GeneratedParameterInfo } from './framework/introspect.js';
import { PARAM_KEYS, PARAM_META, ParameterBundle, ParamKey, buildParams, isParamKey } from './params.js';
import { RECORD_FIELDS } from './record-fields.js';
import { ValidationError } from './framework/errors.js';

export { buildParams };

// =============================================================================
// TYPES
// =============================================================================

export type ParameterInfo = GeneratedParameterInfo;

export interface ParameterSchema {
  [key: string]: ParameterInfo;
}

// =============================================================================
// PARAMETER SCHEMA (auto-generated from module paramMeta)
// =============================================================================

/**
 * Returns structured metadata for every bundle field, or only those up to
 * `maxTier` (1 = user-facing inputs).
 */
export function describeParameters(maxTier: 1 | 2 | 3 = 3): ParameterSchema {
  return generateParameterSchema(PARAM_META, maxTier);
}

/** Bundle field names in declaration order */
export function listParameters(): string[] {
  return [...PARAM_KEYS];
}

/**
 * Build a bundle from name/value pairs coming from an untyped source
 * (agent tool call, query string). Unknown names are rejected, not ignored.
 *
 * Example:
 *   buildParamsFromEntries({ anchorMW: 3, anchorTariffKWh: 0.14 })
 */
export function buildParamsFromEntries(entries: Record<string, number>): ParameterBundle {
  const unknown = Object.keys(entries).filter(name => !isParamKey(name));
  if (unknown.length > 0) {
    throw new ValidationError('introspection', unknown.map(name => `unknown parameter "${name}"`));
  }

  const overrides: Partial<Record<ParamKey, number>> = {};
  for (const [name, value] of Object.entries(entries)) {
    if (isParamKey(name)) {
      overrides[name] = value;
    }
  }
  return buildParams(overrides);
}

// =============================================================================
// OUTPUT SCHEMA
// =============================================================================

export interface OutputInfo {
  unit: string;
  description: string;
  module: string;
}

export interface OutputSchema {
  [key: string]: OutputInfo;
}

/**
 * Returns structured metadata for YearlyRecord fields.
 * Generated from the RECORD_FIELDS table.
 */
export function describeOutputs(): OutputSchema {
  const result: OutputSchema = {};
  for (const def of RECORD_FIELDS) {
    result[def.key] = { unit: def.unit, description: def.description, module: def.module };
  }
  return result;
}

// =============================================================================
// CLI
// =============================================================================

function printParameter(name: string, info: ParameterInfo) {
  const whole = info.integer ? ', whole numbers' : '';
  console.log(`${name} (${info.module}, tier ${info.tier})`);
  console.log(`  ${info.description}`);
  console.log(`  default ${info.default} ${info.unit}; allowed ${info.min} to ${info.max}${whole}`);
  if (info.source) {
    console.log(`  calibrated from: ${info.source}`);
  }
}

/**
 * Summary table grouped by owning module
 */
function printSummaryTable(schema: ParameterSchema) {
  const byModule = new Map<string, string[]>();
  for (const [name, info] of Object.entries(schema)) {
    const names = byModule.get(info.module) ?? [];
    names.push(name);
    byModule.set(info.module, names);
  }

  console.log(`${Object.keys(schema).length} parameters\n`);
  for (const [module, names] of byModule) {
    console.log(`[${module}]`);
    for (const name of names) {
      const info = schema[name];
      const value = `${info.default} ${info.unit}`;
      console.log(`  ${name.padEnd(22)} ${value.padEnd(22)} ${info.min} to ${info.max}`);
    }
    console.log('');
  }
}

async function runCLI() {
  const argv = process.argv.slice(2);

  if (argv.includes('--help') || argv.includes('-h')) {
    console.log('Usage: npx tsx src/introspection.ts [--list | --json | --outputs | --param=NAME]');
    console.log('');
    console.log('  (no flag)      Parameters grouped by module');
    console.log('  --list         Parameter names, one per line');
    console.log('  --json         Parameter and output schema as JSON');
    console.log('  --outputs      Yearly record fields');
    console.log('  --param=NAME   One parameter in detail');
    return;
  }

  const schema = describeParameters();

  if (argv.includes('--list')) {
    for (const name of listParameters()) {
      console.log(name);
    }
    return;
  }

  if (argv.includes('--json')) {
    console.log(JSON.stringify({ parameters: schema, outputs: describeOutputs() }, null, 2));
    return;
  }

  if (argv.includes('--outputs')) {
    for (const [name, info] of Object.entries(describeOutputs())) {
      console.log(`${name.padEnd(20)} ${info.unit.padEnd(10)} ${info.description}`);
    }
    return;
  }

  const requested = argv.find(a => a.startsWith('--param='))?.slice('--param='.length);
  if (requested !== undefined) {
    if (!isParamKey(requested)) {
      console.error(`No parameter named "${requested}". Try --list.`);
      process.exit(1);
    }
    printParameter(requested, schema[requested]);
    return;
  }

  printSummaryTable(schema);
}

if (process.argv[1]?.endsWith('introspection.ts') || process.argv[1]?.endsWith('introspection.js')) {
  runCLI().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
