/**
 * Auto-Generated Introspection
 *
 * Flattens each group's `paramMeta` table into schema entries, so parameter
 * documentation lives next to the module that owns the parameter.
 */

import { ParamGroup } from './module.js';
import { ParamMeta } from './types.js';

/**
 * ParamMeta tagged with the group that declares it.
 */
export interface OwnedParamMeta extends ParamMeta {
  module: string;
}

/**
 * Schema entry for one parameter.
 */
export interface GeneratedParameterInfo {
  type: 'number';
  default: number;
  min: number;
  max: number;
  unit: string;
  description: string;
  module: string;
  tier: 1 | 2 | 3;
  integer: boolean;
  source?: string;
}

/**
 * Tag every entry of a group's paramMeta with the group name.
 */
export function collectParamMeta<TParams extends object>(
  group: ParamGroup<TParams>
): Record<string, OwnedParamMeta> {
  const result: Record<string, OwnedParamMeta> = {};
  for (const key of Object.keys(group.paramMeta) as Array<keyof TParams & string>) {
    result[key] = { ...group.paramMeta[key], module: group.name };
  }
  return result;
}

/**
 * Generate a parameter schema from collected metadata.
 *
 * @param meta - Field name → owned metadata
 * @param maxTier - Include only tiers up to this one (default: all)
 */
export function generateParameterSchema(
  meta: Readonly<Record<string, OwnedParamMeta>>,
  maxTier: 1 | 2 | 3 = 3
): Record<string, GeneratedParameterInfo> {
  const result: Record<string, GeneratedParameterInfo> = {};

  for (const [key, value] of Object.entries(meta)) {
    if (value.tier > maxTier) continue;

    result[key] = {
      type: 'number',
      default: value.range.default,
      min: value.range.min,
      max: value.range.max,
      unit: value.unit,
      description: value.description,
      module: value.module,
      tier: value.tier,
      integer: value.integer ?? false,
      ...(value.source !== undefined ? { source: value.source } : {}),
    };
  }

  return result;
}
