/**
 * Preset Loader
 *
 * Loads named parameter presets from JSON files and turns them into
 * validated bundles. A preset only lists the fields it changes; everything
 * else keeps its default.
 *
 * File format (presets/<name>.json):
 *   {
 *     "name": "Late Expansion",
 *     "description": "Third turbine slips to 2030",
 *     "params": { "expansionYear": 2030 },
 *     "yearRange": [2023, 2035]
 *   }
 */

import { readFile, readdir } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ParameterBundle, ParamKey, buildParams, isParamKey } from './params.js';
import { YearRange } from './framework/types.js';
import { ValidationError } from './framework/errors.js';
import { DEFAULT_YEAR_RANGE } from './constants.js';

// =============================================================================
// TYPES
// =============================================================================

export interface Preset {
  /** Human-readable name */
  name: string;

  /** Description of the preset's assumptions */
  description: string;

  /** Optional metadata */
  meta?: {
    author?: string;
    source?: string;
  };

  /** Parameter overrides (only the fields that differ from defaults) */
  params: Partial<ParameterBundle>;

  /** Optional horizon override */
  yearRange?: YearRange;
}

const KNOWN_KEYS = new Set(['name', 'description', 'meta', 'params', 'yearRange']);

// =============================================================================
// LOADER
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Check a parsed preset document. Unknown keys (top-level or parameter) are
 * warned about and dropped; malformed values are errors.
 */
export function parsePreset(raw: unknown, source: string): Preset {
  if (!isRecord(raw)) {
    throw new ValidationError(`preset ${source}`, ['preset file must contain a JSON object']);
  }

  const errors: string[] = [];

  const name = raw.name;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ValidationError(`preset ${source}`, ["missing required 'name' field"]);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`[presets] Warning: Unrecognized preset key "${key}" will be ignored`);
    }
  }

  const params: Partial<Record<ParamKey, number>> = {};
  if (raw.params !== undefined) {
    if (!isRecord(raw.params)) {
      errors.push('params must be an object');
    } else {
      for (const [key, value] of Object.entries(raw.params)) {
        if (!isParamKey(key)) {
          console.warn(`[presets] Warning: Unrecognized parameter "${key}" will be ignored`);
        } else if (typeof value !== 'number') {
          errors.push(`params.${key} must be a number, got ${JSON.stringify(value)}`);
        } else {
          params[key] = value;
        }
      }
    }
  }

  let yearRange: YearRange | undefined;
  if (raw.yearRange !== undefined) {
    const range = raw.yearRange;
    if (
      Array.isArray(range) &&
      range.length === 2 &&
      typeof range[0] === 'number' &&
      typeof range[1] === 'number'
    ) {
      yearRange = [range[0], range[1]];
    } else {
      errors.push(`yearRange must be [startYear, endYear], got ${JSON.stringify(range)}`);
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(`preset ${name}`, errors);
  }

  const meta = isRecord(raw.meta)
    ? { author: optionalString(raw.meta.author), source: optionalString(raw.meta.source) }
    : undefined;

  return {
    name,
    description: optionalString(raw.description) ?? '',
    ...(meta ? { meta } : {}),
    params,
    ...(yearRange ? { yearRange } : {}),
  };
}

/**
 * Load a preset from a JSON file
 */
export async function loadPreset(path: string): Promise<Preset> {
  const content = await readFile(path, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parsePreset(raw, path);
}

/**
 * Build a validated bundle from a preset, with optional overrides on top
 */
export function presetToParams(
  preset: Preset,
  overrides: Partial<ParameterBundle> = {}
): ParameterBundle {
  return buildParams({ ...preset.params, ...overrides });
}

/**
 * The preset's horizon, or the default one
 */
export function presetYearRange(preset: Preset): YearRange {
  return preset.yearRange ?? DEFAULT_YEAR_RANGE;
}

/**
 * Load preset and convert to params, with optional CLI overrides
 */
export async function loadPresetAsParams(
  path: string,
  overrides?: Partial<ParameterBundle>
): Promise<{ preset: Preset; params: ParameterBundle }> {
  const preset = await loadPreset(path);
  return { preset, params: presetToParams(preset, overrides) };
}

// =============================================================================
// PRESET LISTING
// =============================================================================

const PRESETS_DIR = join(dirname(fileURLToPath(import.meta.url)), '../presets');

/**
 * List available presets in the presets directory
 */
export async function listPresets(presetsDir: string = PRESETS_DIR): Promise<string[]> {
  let files: string[];
  try {
    files = await readdir(presetsDir);
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
  return files
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace(/\.json$/, ''))
    .sort();
}

/**
 * Get preset path from name
 */
export function getPresetPath(name: string, presetsDir: string = PRESETS_DIR): string {
  return join(presetsDir, `${name}.json`);
}
