/**
 * Option declarations and the registry that holds them.
 *
 * @packageDocumentation
 */

export { OptionBuilder, declaredType, option } from './option.js';
export type { OptionSpec } from './option.js';
export { CONFIG_KEY, HELP_KEY, OptionRegistry } from './registry.js';
export type { PreparedRegistry, ReservedOptions } from './registry.js';
