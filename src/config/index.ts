/**
 * Host-facing configuration API.
 *
 * Override precedence: command line > config document > defaults
 *
 * @packageDocumentation
 */

export { Config } from './config.js';
export type { ConfigOptions, ParseOptions } from './config.js';
