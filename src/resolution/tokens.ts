/**
 * Command-line token classification and typed token parsing.
 *
 * @packageDocumentation
 */

import { Value, type DataType } from '../value/index.js';

/**
 * Classification of a single command-line token.
 */
export type ClassifiedToken =
  | { readonly kind: 'unknown'; readonly token: string }
  | { readonly kind: 'long-flag'; readonly token: string; readonly key: string }
  | { readonly kind: 'short-flag'; readonly token: string; readonly key: string }
  | { readonly kind: 'value'; readonly token: string };

/** Optional sign, digits with optional fraction (or a bare fraction), optional exponent. */
const NUMERIC_LITERAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

const INTEGER_LITERAL = /^[-+]?\d+$/;

const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'f']);

/**
 * Whether a token is a complete numeric literal, such as `-3.14` or `1e5`.
 */
export function isNumericLiteral(token: string): boolean {
  return NUMERIC_LITERAL.test(token);
}

/**
 * Classifies one command-line token.
 *
 * A token starting with `-` is checked as a numeric literal before it is
 * checked as a flag, so `-3.14` is a value and can follow a flag.
 * A flag with nothing after its prefix (`-` or `--`) is malformed.
 *
 * @param token - The raw token.
 * @returns The token's classification.
 *
 * @example
 * ```typescript
 * classifyToken('--port');  // { kind: 'long-flag', key: 'port', ... }
 * classifyToken('-p');      // { kind: 'short-flag', key: 'p', ... }
 * classifyToken('-3.14');   // { kind: 'value', ... }
 * ```
 */
export function classifyToken(token: string): ClassifiedToken {
  if (token === '') {
    return { kind: 'unknown', token };
  }
  if (!token.startsWith('-') || isNumericLiteral(token)) {
    return { kind: 'value', token };
  }
  if (token.startsWith('--')) {
    const key = token.slice(2);
    return key === '' ? { kind: 'unknown', token } : { kind: 'long-flag', token, key };
  }
  const key = token.slice(1);
  return key === '' ? { kind: 'unknown', token } : { kind: 'short-flag', token, key };
}

/**
 * Parses a value token against a declared type.
 *
 * - `int`: a complete base-10 integer within the safe range.
 * - `number`: a complete numeric literal.
 * - `bool`: `false` or `f` in any case is false; every other token is true,
 *   including `0` and `no`.
 * - `text`, and options with no declared type: the literal token.
 *
 * @param token - The raw token.
 * @param type - The declared type to parse against.
 * @returns The parsed value, or an unknown value when parsing fails.
 */
export function parseTokenAs(token: string, type: DataType): Value {
  switch (type) {
    case 'int': {
      if (!INTEGER_LITERAL.test(token)) {
        return Value.unknown();
      }
      const parsed = Number.parseInt(token, 10);
      return Number.isSafeInteger(parsed) ? Value.int(parsed) : Value.unknown();
    }
    case 'number':
      return isNumericLiteral(token) ? Value.number(Number.parseFloat(token)) : Value.unknown();
    case 'bool':
      return Value.bool(!FALSE_WORDS.has(token.toLowerCase()));
    case 'text':
    case 'unknown':
      return Value.text(token);
  }
}
