/**
 * Text renderers for option registries and resolved values.
 *
 * @packageDocumentation
 */

export { renderUsage } from './usage.js';
export type { UsageOptions } from './usage.js';
export { renderValueTable } from './table.js';
export type { TableOptions } from './table.js';
