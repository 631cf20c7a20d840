/**
 * Dynamically-typed option values.
 *
 * @packageDocumentation
 */

export { TypeMismatchError, Value, typeLabel } from './value.js';
export type { DataType, Scalar } from './value.js';
