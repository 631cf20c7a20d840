/**
 * Token classification, precedence merging and validation.
 *
 * @packageDocumentation
 */

export { ResolutionEngine } from './engine.js';
export type { EngineOptions, ResolutionResult } from './engine.js';
export { DiagnosticLog, isAtLeast, worstOf } from './diagnostics.js';
export type { Diagnostic, LogThreshold, Severity } from './diagnostics.js';
export { ResolvedOptions } from './resolved.js';
export type { ResolvedEntry, ValueSource } from './resolved.js';
export { classifyToken, isNumericLiteral, parseTokenAs } from './tokens.js';
export type { ClassifiedToken } from './tokens.js';
export { checkFormat, validate } from './validator.js';
