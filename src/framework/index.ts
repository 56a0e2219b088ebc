/**
 * Framework barrel export.
 *
 * All generic, domain-independent framework primitives.
 * Domain types (Scenario, etc.) live in ../domain-types.ts.
 */

export * from './types.js';
export * from './module.js';
export * from './errors.js';
export * from './param-check.js';
export * from './introspect.js';
export * from './validated-merge.js';
export * from './memo.js';
