/**
 * Option declarations and their builder.
 *
 * @packageDocumentation
 */

import { Value, type DataType, type Scalar } from '../value/index.js';

/**
 * Static declaration of one configuration option.
 *
 * The tag of `defaultValue` fixes the option's declared type. An `unknown`
 * default means the option has no declared type and is only legal when
 * the option is required.
 */
export interface OptionSpec {
  /** Canonical long key. May contain `.` segments denoting nesting. */
  readonly key: string;
  /** Single-token alias, or the empty string when the option has none. */
  readonly shortflag: string;
  /** Human-readable description shown in usage text. */
  readonly description: string;
  /** Value used when neither a document nor the command line supplies one. */
  readonly defaultValue: Value;
  /** Whether a value must be present after resolution. */
  readonly required: boolean;
  /** Excluded from required-ness checks and from usage text. */
  readonly hidden: boolean;
}

/**
 * Returns the declared type of an option.
 */
export function declaredType(spec: OptionSpec): DataType {
  return spec.defaultValue.type();
}

/**
 * Mutable builder producing immutable {@link OptionSpec} objects.
 *
 * @example
 * ```typescript
 * const spec = option('server.port')
 *   .shortflag('p')
 *   .defaultValue(Value.int(8080))
 *   .description('Port to listen on')
 *   .build();
 * ```
 */
export class OptionBuilder {
  private readonly key: string;
  private shortflagValue = '';
  private descriptionValue = '';
  private defaultValueValue: Value = Value.unknown();
  private requiredValue = false;
  private hiddenValue = false;

  /**
   * Creates a builder for the given canonical key.
   *
   * @param key - Canonical long key of the option.
   */
  constructor(key: string) {
    this.key = key;
  }

  /**
   * Creates a builder pre-filled from an existing spec, for adjusting a declared option.
   *
   * @param spec - The spec to start from.
   * @returns A new builder.
   */
  static from(spec: OptionSpec): OptionBuilder {
    return new OptionBuilder(spec.key)
      .shortflag(spec.shortflag)
      .description(spec.description)
      .defaultValue(spec.defaultValue)
      .required(spec.required)
      .hidden(spec.hidden);
  }

  shortflag(shortflag: string): this {
    this.shortflagValue = shortflag;
    return this;
  }

  description(description: string): this {
    this.descriptionValue = description;
    return this;
  }

  /**
   * Sets the default value, which also fixes the declared type.
   *
   * Plain numbers are inferred: integral numbers become `int`. Pass
   * `Value.number(...)` for a float-typed option with an integral default.
   *
   * @param value - A Value or a plain scalar.
   * @returns This builder.
   */
  defaultValue(value: Value | Scalar): this {
    this.defaultValueValue = value instanceof Value ? value.copy() : Value.from(value);
    return this;
  }

  required(required: boolean): this {
    this.requiredValue = required;
    return this;
  }

  hidden(hidden: boolean): this {
    this.hiddenValue = hidden;
    return this;
  }

  /**
   * Produces the immutable spec.
   */
  build(): OptionSpec {
    return Object.freeze({
      key: this.key,
      shortflag: this.shortflagValue,
      description: this.descriptionValue,
      defaultValue: this.defaultValueValue.copy(),
      required: this.requiredValue,
      hidden: this.hiddenValue,
    });
  }
}

/**
 * Starts declaring an option.
 *
 * @param key - Canonical long key of the option.
 * @returns A new builder.
 */
export function option(key: string): OptionBuilder {
  return new OptionBuilder(key);
}
